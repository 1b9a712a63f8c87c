import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';

// --- Schemas ---

const patternList = z.array(z.string().min(1)).min(1);

export const regionRuleSchema = z.object({
  key: z.string().min(1),
  matchTerms: z.array(z.string().min(1)).min(1),
  fallbackValue: z.number().nonnegative(),
});

export const ledgerRulesSchema = z.object({
  ruleSetId: z.string().min(1),
  defaultEligibleDays: z.number().int().nonnegative(),
  prorationMonthDays: z.number().int().positive(),
  midPeriodDay: z.number().int().min(1).max(31),
  affirmativeNoticeMarker: z.string().min(1),
  directorTitleTerm: z.string().min(1),
  costSplit: z.object({
    employerRate: z.number().min(0).max(1),
    employeeRate: z.number().min(0).max(1),
  }),
  regions: z.array(regionRuleSchema),
  defaultRegion: z.object({
    key: z.string().min(1),
    fallbackValue: z.number().nonnegative(),
  }),
  daysTableHeaderTokens: z.object({
    label: z.string().min(1),
    days: z.string().min(1),
  }),
  columnPatterns: z.object({
    identifier: patternList,
    category: patternList,
    jobTitle: patternList,
    admissionDate: patternList,
    vacationDays: patternList,
    terminationDate: patternList,
    noticeStatus: patternList,
    region: patternList,
    value: patternList,
  }),
  observationDelimiter: z.string(),
});

export const sourcesConfigSchema = z.object({
  searchFolders: z.array(z.string()).min(1),
  files: z.object({
    roster: z.string().min(1),
    vacation: z.string().min(1),
    termination: z.string().min(1),
    admission: z.string().min(1),
    regionValues: z.string().min(1),
    workingDays: z.string().min(1),
    leave: z.string().min(1),
    interns: z.string().min(1),
    apprentices: z.string().min(1),
    overseas: z.string().min(1),
  }),
});

export const packMetaSchema = z.object({
  packId: z.string().min(1),
  title: z.string(),
  jurisdiction: z.string(),
  version: z.string(),
  currency: z.string(),
  defaultPeriod: z.string().regex(/^\d{4}-\d{2}$/),
  effectiveDate: z.string(),
  createdAt: z.string(),
});

// --- Types ---

export type RegionRule = z.infer<typeof regionRuleSchema>;
export type LedgerRules = z.infer<typeof ledgerRulesSchema>;
export type SourcesConfig = z.infer<typeof sourcesConfigSchema>;
export type PackMeta = z.infer<typeof packMetaSchema>;

export interface PolicyPack {
  meta: PackMeta;
  rules: LedgerRules;
  sources: SourcesConfig;
}

// --- Loader ---

async function readJson<T>(packDir: string, file: string, schema: z.ZodType<T>): Promise<T> {
  const raw = await readFile(path.join(packDir, file), 'utf-8');
  const result = schema.safeParse(JSON.parse(raw));
  if (!result.success) {
    throw new Error(`Invalid ${file} in ${packDir}: ${result.error.message}`);
  }
  return result.data;
}

export async function loadPolicyPack(packDir: string): Promise<PolicyPack> {
  const [meta, rules, sources] = await Promise.all([
    readJson(packDir, 'pack.json', packMetaSchema),
    readJson(packDir, 'rules.json', ledgerRulesSchema),
    readJson(packDir, 'sources.json', sourcesConfigSchema),
  ]);

  return { meta, rules, sources };
}
