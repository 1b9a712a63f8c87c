// ledger-core: Pure logic. Normalizer, exclusions, lookups, consolidation,
// entitlement rules and the ledger engine. Reads policy packs; no HTTP.

export const LEDGER_CORE_VERSION = '1.0.0';
