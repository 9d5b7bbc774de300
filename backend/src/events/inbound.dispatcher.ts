import { Injectable } from '@nestjs/common';
import { GameError, UnknownMatchError } from '@/common/errors/game.errors';
import { MatchRegistryService } from '@/modules/match/match-registry.service';
import { MatchmakingService } from '@/modules/matchmaking/services/matchmaking.service';
import { SessionRegistryService } from '@/modules/session/session-registry.service';
import { LoggerService } from '@/shared/logger/logger.service';
import { ClientMessage, toPlayer } from './dto/client-message.dto';
import { InboundEvent } from './types/inbound-event.types';

export function toInboundEvent(
  sessionId: string,
  message: ClientMessage,
): InboundEvent {
  switch (message.type) {
    case 'join_queue':
      return {
        kind: 'join_queue',
        sessionId,
        player: toPlayer(message.player),
      };
    case 'leave_queue':
      return { kind: 'leave_queue', sessionId };
    case 'game_ready':
      return { kind: 'game_ready', sessionId, roomId: message.room_id };
  }
}

/**
 * Single entry point for everything arriving from clients and chat.
 * Game errors are benign races here: they are logged and the event dropped.
 */
@Injectable()
export class InboundDispatcher {
  constructor(
    private readonly logger: LoggerService,
    private readonly sessions: SessionRegistryService,
    private readonly matchmaking: MatchmakingService,
    private readonly matches: MatchRegistryService,
  ) {}

  dispatch(event: InboundEvent): void {
    try {
      this.handle(event);
    } catch (error) {
      if (error instanceof GameError) {
        this.logger.warn(
          `Dropped ${event.kind}: ${error.message}`,
          InboundDispatcher.name,
        );
        return;
      }
      this.logger.error(
        `Failed to handle ${event.kind}`,
        error instanceof Error ? error.stack : String(error),
        InboundDispatcher.name,
      );
    }
  }

  private handle(event: InboundEvent): void {
    switch (event.kind) {
      case 'join_queue':
        this.matchmaking.join(event.sessionId, event.player);
        return;

      case 'leave_queue':
        this.matchmaking.leave(event.sessionId);
        return;

      case 'game_ready': {
        const current = this.matches.matchIdForSession(event.sessionId);
        if (event.roomId && current && event.roomId !== current) {
          throw new UnknownMatchError(event.roomId);
        }
        this.matches.routeReady(event.sessionId);
        return;
      }

      case 'chat_pull': {
        const routed = this.matches.routeChatCommand(
          event.channel,
          event.viewerId,
          event.at,
        );
        if (!routed) {
          this.logger.verbose(
            `No live match for channel ${event.channel}`,
            InboundDispatcher.name,
          );
        }
        return;
      }

      case 'disconnect': {
        const player = this.sessions.getPlayer(event.sessionId);
        this.logger.log(
          `Session ${event.sessionId} closed${
            player ? ` (player ${player.id}, ${player.username})` : ''
          }`,
          InboundDispatcher.name,
        );

        this.matchmaking.remove(event.sessionId);
        try {
          if (this.matches.hasSession(event.sessionId)) {
            this.matches.routeDisconnect(event.sessionId);
          }
        } finally {
          this.sessions.unregister(event.sessionId);
        }
        return;
      }
    }
  }
}
