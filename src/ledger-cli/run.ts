import path from 'path';
import { config } from '@shared/config';
import type { LedgerSummaryRecord } from '@shared/types';
import { runLedger } from '@core/engine';
import { consoleLogger, type LedgerLogger } from '@core/logger';
import { summarizeLedger } from '@core/metrics';
import { loadPolicyPack } from '@core/policy-pack';
import { formatPeriod } from '@core/values';
import { loadLedgerSources } from '@sheets/loader';
import { defaultOutputName, writeLedgerFile } from '@sheets/writer';
import { parseCliArgs, resolvePeriod, USAGE, type CliOptions } from './args';

export interface CliRunResult {
  outputPath: string;
  summary: LedgerSummaryRecord;
}

export async function runCli(
  options: CliOptions,
  logger: LedgerLogger = consoleLogger,
): Promise<CliRunResult> {
  const pack = await loadPolicyPack(options.packDir ?? config.policyPackDir);
  logger.info('POLICY', `Loaded ${pack.meta.packId} (${pack.rules.ruleSetId})`);

  const period = resolvePeriod(options.period, pack.meta.defaultPeriod, logger);
  logger.info('LEDGER', `Period: ${formatPeriod(period)}-01`);

  const sources = await loadLedgerSources(options.dataDir ?? config.dataDir, pack.sources, logger);
  const result = runLedger({ sources, period, rules: pack.rules, logger });

  const outputPath = await writeLedgerFile(
    result,
    options.output ?? path.join(config.outputDir, defaultOutputName()),
  );
  const summary = summarizeLedger(result);

  logger.info('LEDGER', `File written: ${outputPath}`);
  logger.info('LEDGER', `Rows: ${summary.rowCount}`);

  return { outputPath, summary };
}

/** Exit code: 0 on success, 1 on any failure. */
export async function main(argv: string[], logger: LedgerLogger = consoleLogger): Promise<number> {
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      console.warn(USAGE);
      return 0;
    }
    await runCli(options, logger);
    return 0;
  } catch (err) {
    logger.error('LEDGER', `Failed: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
