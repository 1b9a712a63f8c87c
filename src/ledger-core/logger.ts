// src/ledger-core/logger.ts

export type LogTag = 'SOURCES' | 'EXCLUSIONS' | 'LOOKUPS' | 'LEDGER' | 'POLICY';

export interface LedgerLogger {
  info(tag: LogTag, message: string): void;
  warn(tag: LogTag, message: string): void;
  error(tag: LogTag, message: string, err?: unknown): void;
}

export const consoleLogger: LedgerLogger = {
  info: (tag, message) => console.warn(`[${tag}] ${message}`),
  warn: (tag, message) => console.warn(`[${tag}] WARNING: ${message}`),
  error: (tag, message, err) => {
    if (err === undefined) {
      console.error(`[${tag}] ${message}`);
    } else {
      console.error(`[${tag}] ${message}`, err instanceof Error ? err.message : err);
    }
  },
};
