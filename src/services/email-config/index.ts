export type { EmailConfigStore, EmailConfiguration, EmailConfigurationInput } from './types.js';
export { SqliteEmailConfigStore } from './sqlite.js';
