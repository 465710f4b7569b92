export type { ProcessedMessageStore } from './types.js';
export { SqliteProcessedMessageStore } from './sqlite.js';
