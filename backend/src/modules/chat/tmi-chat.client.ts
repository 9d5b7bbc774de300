import tmi from 'tmi.js';
import { LoggerService } from '@/shared/logger/logger.service';
import { ChatClient, ChatMessageListener } from './types/chat.types';

const CONTEXT = 'TwitchChat';

/** Anonymous, read-only Twitch chat connection. */
export class TmiChatClient implements ChatClient {
  private readonly client: tmi.Client;

  constructor(logger: LoggerService) {
    this.client = new tmi.Client({
      channels: [],
      options: { debug: false },
      connection: { reconnect: true, secure: true },
      logger: {
        info: (message: string) => logger.debug(message, CONTEXT),
        warn: (message: string) => logger.warn(message, CONTEXT),
        error: (message: string) => logger.error(message, undefined, CONTEXT),
      },
    });
  }

  connect() {
    return this.client.connect();
  }

  disconnect() {
    return this.client.disconnect();
  }

  join(channel: string) {
    return this.client.join(channel);
  }

  part(channel: string) {
    return this.client.part(channel);
  }

  onMessage(listener: ChatMessageListener): void {
    this.client.on('message', (channel, tags, message, self) =>
      listener(channel, tags, message, self),
    );
  }
}
