// src/ledger-core/errors.ts

/** Raised when the primary roster cannot drive a run. Always fatal. */
export class LedgerPreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerPreconditionError';
  }
}
