import { parseArgs } from 'util';
import type { LedgerLogger } from '@core/logger';
import { formatPeriod, parsePeriod, type TargetPeriod } from '@core/values';

export interface CliOptions {
  period?: string;
  output?: string;
  dataDir?: string;
  packDir?: string;
  help: boolean;
}

export const USAGE = [
  'Usage: vr-ledger [options]',
  '',
  '  --competencia YYYY-MM   target month (default: the policy pack default)',
  '  --saida PATH            output xlsx (default: VR_FINAL_<timestamp>.xlsx)',
  '  --dados DIR             data root holding the source spreadsheets',
  '  --pack DIR              policy pack directory',
  '  -h, --help              show this message',
].join('\n');

/** Throws on unknown flags or a flag missing its value. */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      competencia: { type: 'string' },
      saida: { type: 'string' },
      dados: { type: 'string' },
      pack: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  return {
    period: values.competencia,
    output: values.saida?.trim() || undefined,
    dataDir: values.dados,
    packDir: values.pack,
    help: values.help ?? false,
  };
}

/** Unreadable periods fall back to `fallback` with a warning. */
export function resolvePeriod(
  requested: string | undefined,
  fallback: string,
  logger: LedgerLogger,
): TargetPeriod {
  const defaultPeriod = parsePeriod(fallback);
  if (!defaultPeriod) {
    throw new Error(`Invalid default period: ${fallback}`);
  }
  if (requested === undefined) return defaultPeriod;

  const period = parsePeriod(requested);
  if (!period) {
    logger.warn('LEDGER', `Invalid period "${requested}", using ${formatPeriod(defaultPeriod)}`);
    return defaultPeriod;
  }
  return period;
}
