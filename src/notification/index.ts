export { TelegramClient } from './TelegramClient.js';
export { formatErrorMessage } from './formatter.js';
export type { TelegramClientConfig, MessagingTransport, Notifier } from './types.js';
