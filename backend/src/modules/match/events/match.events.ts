import { Injectable } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { MatchSide } from '@/common/enums';
import { GameError } from '@/common/errors/game.errors';
import { EVENTS } from '@/events/events.constant';
import { OpponentInfo } from '@/events/types/messages.types';
import { MatchFoundEvent } from '@/modules/matchmaking/match-found.event';
import {
  Player,
  channelOf,
} from '@/modules/matchmaking/types/matchmaking.types';
import { SessionRegistryService } from '@/modules/session/session-registry.service';
import { SessionDeliveryFailedPayload } from '@/modules/session/types/session.types';
import { LoggerService } from '@/shared/logger/logger.service';
import { MatchRegistryService } from '../match-registry.service';

function toOpponent(player: Player): OpponentInfo {
  return {
    id: player.id,
    username: player.username,
    channel_name: channelOf(player),
    profile_image: player.profile_image,
    viewer_count: player.viewer_count,
  };
}

@Injectable()
export class MatchEvents {
  constructor(
    private readonly registry: MatchRegistryService,
    private readonly sessions: SessionRegistryService,
    private readonly logger: LoggerService,
  ) {}

  // synchronous so both players hear about the match in the same pairing pass
  @OnEvent(EVENTS.MATCH_FOUND)
  handleMatchFound(event: MatchFoundEvent) {
    const { pairId, sideA, sideB } = event.pair;

    try {
      const matchId = this.registry.createMatch(sideA, sideB);

      this.sessions.send(sideA.sessionId, {
        type: 'match_found',
        room_id: matchId,
        side: MatchSide.PLAYER1,
        opponent: toOpponent(sideB.player),
      });
      this.sessions.send(sideB.sessionId, {
        type: 'match_found',
        room_id: matchId,
        side: MatchSide.PLAYER2,
        opponent: toOpponent(sideA.player),
      });
    } catch (error) {
      if (error instanceof GameError) {
        this.logger.warn(
          `Dropped pair ${pairId}: ${error.message}`,
          MatchEvents.name,
        );
        return;
      }
      this.logger.error(
        `Failed to handle pair ${pairId}`,
        error instanceof Error ? error.stack : String(error),
        MatchEvents.name,
      );
    }
  }

  // deferred so a failed send never re-enters the match that is broadcasting
  @OnEvent(EVENTS.SESSION_DELIVERY_FAILED, { async: true })
  handleDeliveryFailed({ sessionId }: SessionDeliveryFailedPayload) {
    if (!this.registry.hasSession(sessionId)) return;

    try {
      this.registry.routeDisconnect(sessionId);
    } catch (error) {
      this.logger.warn(
        `Disconnect routing for ${sessionId} failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
        MatchEvents.name,
      );
    }
  }
}
