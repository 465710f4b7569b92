export type { GlobalConfigStore, GlobalSetting } from './types.js';
export { SqliteGlobalConfigStore } from './sqlite.js';
