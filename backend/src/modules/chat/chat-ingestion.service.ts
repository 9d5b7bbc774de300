import {
  Inject,
  Injectable,
  OnModuleDestroy,
  OnModuleInit,
  Optional,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OnEvent } from '@nestjs/event-emitter';
import { TwitchConfig } from '@/config/twitch.config';
import { EVENTS } from '@/events/events.constant';
import { InboundDispatcher } from '@/events/inbound.dispatcher';
import {
  MatchCreatedPayload,
  MatchEndedPayload,
} from '@/modules/match/types/match.types';
import { LoggerService } from '@/shared/logger/logger.service';
import { CHAT_CLIENT } from './chat.constants';
import { PullCooldown } from './pull-cooldown';
import { ChatClient, ChatTags } from './types/chat.types';

/**
 * Turns pull commands in streamers' chats into ChatPull events.
 * Channels are joined while at least one live match needs them.
 */
@Injectable()
export class ChatIngestionService implements OnModuleInit, OnModuleDestroy {
  private readonly channelRefs = new Map<string, number>();
  private readonly cooldown: PullCooldown;
  private readonly pullCommand: string;

  constructor(
    private readonly logger: LoggerService,
    private readonly dispatcher: InboundDispatcher,
    configService: ConfigService,
    @Optional()
    @Inject(CHAT_CLIENT)
    private readonly client: ChatClient | null = null,
  ) {
    const twitch = configService.get<TwitchConfig>('twitch');
    this.pullCommand = (twitch?.pullCommand ?? '!pull').toLowerCase();
    this.cooldown = new PullCooldown(twitch?.pullCooldownMs ?? 500);
  }

  onModuleInit() {
    const client = this.client;
    if (!client) {
      this.logger.log('Chat ingestion disabled', ChatIngestionService.name);
      return;
    }

    client.onMessage((channel, tags, message, self) => {
      this.handleMessage(channel, tags, message, self);
    });

    void client.connect().then(
      () => this.logger.log('Connected to chat', ChatIngestionService.name),
      (error: unknown) =>
        this.logger.error(
          'Chat connection failed',
          error,
          ChatIngestionService.name,
        ),
    );
  }

  async onModuleDestroy() {
    if (!this.client) return;
    try {
      await this.client.disconnect();
    } catch (error) {
      this.logger.warn(
        `Chat disconnect failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
        ChatIngestionService.name,
      );
    }
  }

  @OnEvent(EVENTS.MATCH_CREATED)
  handleMatchCreated({ channels }: MatchCreatedPayload) {
    for (const channel of new Set(channels)) {
      const count = this.channelRefs.get(channel) ?? 0;
      this.channelRefs.set(channel, count + 1);
      if (count === 0) this.join(channel);
    }
  }

  @OnEvent(EVENTS.MATCH_ENDED)
  handleMatchEnded({ channels }: MatchEndedPayload) {
    for (const channel of new Set(channels)) {
      const count = this.channelRefs.get(channel);
      if (count === undefined) continue;

      if (count > 1) {
        this.channelRefs.set(channel, count - 1);
        continue;
      }
      this.channelRefs.delete(channel);
      this.cooldown.forgetChannel(channel);
      this.part(channel);
    }
  }

  /**
   * @returns true when the message was forwarded as a pull
   */
  handleMessage(
    channel: string,
    tags: ChatTags,
    message: string,
    self: boolean,
    at = Date.now(),
  ): boolean {
    if (self) return false;

    const [command] = message.trim().split(/\s+/, 1);
    if (command.toLowerCase() !== this.pullCommand) return false;

    const viewerId = tags['user-id'] || tags.username;
    if (!viewerId) return false;

    const channelId = channel.replace(/^#/, '').toLowerCase();
    if (!this.cooldown.tryAcquire(channelId, viewerId, at)) return false;

    this.dispatcher.dispatch({
      kind: 'chat_pull',
      channel: channelId,
      viewerId,
      at,
    });
    return true;
  }

  joinedChannels(): string[] {
    return [...this.channelRefs.keys()];
  }

  private join(channel: string) {
    if (!this.client) return;
    void this.client.join(channel).then(
      () => this.logger.debug(`Joined #${channel}`, ChatIngestionService.name),
      (error: unknown) =>
        this.logger.warn(
          `Could not join #${channel}: ${String(error)}`,
          ChatIngestionService.name,
        ),
    );
  }

  private part(channel: string) {
    if (!this.client) return;
    void this.client.part(channel).then(
      () => this.logger.debug(`Left #${channel}`, ChatIngestionService.name),
      (error: unknown) =>
        this.logger.warn(
          `Could not leave #${channel}: ${String(error)}`,
          ChatIngestionService.name,
        ),
    );
  }
}
