/** Injection token for the chat connection; null when ingestion is disabled */
export const CHAT_CLIENT = 'CHAT_CLIENT';
