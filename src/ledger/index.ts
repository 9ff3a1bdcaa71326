export { ChangeLedger, hashFile, toLedgerKey, recordFromEntry, entryFromRecord } from './store';
export type { ChangeLedgerOptions, LedgerEntry } from './store';
