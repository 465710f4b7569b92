export type { IncomingEmail, MailClient, MailClientFactory, MailConnectionSettings } from './types.js';
export { ImapMailClient, buildUnreadQuery, createImapMailClient } from './imap.js';
