export type {
  AccountMappings,
  LedgerClient,
  LedgerPostResult,
  LedgerPosting,
  LedgerTransactionPayload,
  TransactionCandidate,
} from './types.js';
export { HttpLedgerClient, parseMappings, toLedgerAmount, toLedgerDate } from './http.js';
