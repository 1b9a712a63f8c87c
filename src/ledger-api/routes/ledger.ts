import { Router } from 'express';
import { z } from 'zod';
import { runLedger, type LedgerResult, type LedgerSources } from '@core/engine';
import type { LedgerLogger } from '@core/logger';
import { summarizeLedger } from '@core/metrics';
import type { PolicyPack } from '@core/policy-pack';
import { formatPeriod, parsePeriod } from '@core/values';
import { buildLedgerWorkbook } from '@sheets/writer';

export const ledgerRequestSchema = z.object({
  period: z
    .string()
    .regex(/^\d{4}-\d{2}$/, 'period must be YYYY-MM')
    .optional(),
});

export interface LedgerRouterDeps {
  policyPack: PolicyPack;
  dataDir: string;
  logger: LedgerLogger;
  loadSources: (dataDir: string, pack: PolicyPack, logger: LedgerLogger) => Promise<LedgerSources>;
}

export function createLedgerRouter(deps: LedgerRouterDeps): Router {
  const router = Router();
  const { policyPack, logger } = deps;

  async function compute(requested: string | undefined): Promise<LedgerResult | string> {
    const period = parsePeriod(requested ?? policyPack.meta.defaultPeriod);
    if (!period) return `Invalid period: ${requested}`;

    const sources = await deps.loadSources(deps.dataDir, policyPack, logger);
    return runLedger({ sources, period, rules: policyPack.rules, logger });
  }

  // POST /ledger -- compute the ledger for a period
  router.post('/', async (req, res, next) => {
    const parsed = ledgerRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ success: false, error: parsed.error.issues[0]?.message });
    }

    try {
      const result = await compute(parsed.data.period);
      if (typeof result === 'string') {
        return res.status(400).json({ success: false, error: result });
      }
      res.json({
        success: true,
        data: {
          period: formatPeriod(result.period),
          summary: summarizeLedger(result),
          rows: result.rows,
        },
      });
    } catch (err) {
      next(err);
    }
  });

  // GET /ledger/export?period=YYYY-MM -- the xlsx artifact
  router.get('/export', async (req, res, next) => {
    const parsed = ledgerRequestSchema.safeParse({
      period: typeof req.query.period === 'string' ? req.query.period : undefined,
    });
    if (!parsed.success) {
      return res.status(400).json({ success: false, error: parsed.error.issues[0]?.message });
    }

    try {
      const result = await compute(parsed.data.period);
      if (typeof result === 'string') {
        return res.status(400).json({ success: false, error: result });
      }
      res.setHeader(
        'Content-Type',
        'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
      );
      res.setHeader(
        'Content-Disposition',
        `attachment; filename="VR_FINAL_${formatPeriod(result.period)}.xlsx"`,
      );
      await buildLedgerWorkbook(result).xlsx.write(res);
      res.end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
