/** The message tags ingestion reads */
export interface ChatTags {
  'user-id'?: string;
  username?: string;
}

export type ChatMessageListener = (
  channel: string,
  tags: ChatTags,
  message: string,
  self: boolean,
) => void;

export interface ChatClient {
  connect(): Promise<unknown>;
  disconnect(): Promise<unknown>;
  join(channel: string): Promise<unknown>;
  part(channel: string): Promise<unknown>;
  onMessage(listener: ChatMessageListener): void;
}
