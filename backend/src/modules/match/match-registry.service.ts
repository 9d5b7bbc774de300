import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { randomUUID } from 'crypto';
import { MatchSide } from '@/common/enums';
import {
  DuplicateParticipantError,
  UnknownMatchError,
  UnknownSessionError,
} from '@/common/errors/game.errors';
import { GameConfig } from '@/config/game.config';
import { EVENTS } from '@/events/events.constant';
import { SessionRegistryService } from '@/modules/session/session-registry.service';
import { LoggerService } from '@/shared/logger/logger.service';
import { MatchEngine } from './engine/match.engine';
import { GAME_CONFIG } from './match.constants';
import {
  ChannelRoute,
  MatchCreatedPayload,
  MatchEndedPayload,
  MatchResult,
  MatchStartedPayload,
  Participant,
} from './types/match.types';

/**
 * Owns every live match and the lookups that route inbound events to them.
 * A match and all of its mappings are dropped as soon as it has sent its
 * final broadcast.
 */
@Injectable()
export class MatchRegistryService implements OnModuleDestroy {
  private readonly matches = new Map<string, MatchEngine>();
  private readonly sessionToMatch = new Map<string, string>();
  private readonly playerToMatch = new Map<string, string>();
  // one channel can feed several matches when streamers share a chat
  private readonly channelRoutes = new Map<string, ChannelRoute[]>();

  constructor(
    private readonly logger: LoggerService,
    private readonly eventEmitter: EventEmitter2,
    private readonly sessions: SessionRegistryService,
    @Inject(GAME_CONFIG) private readonly config: GameConfig,
  ) {}

  createMatch(sideA: Participant, sideB: Participant): string {
    if (sideA.player.id === sideB.player.id) {
      throw new DuplicateParticipantError(sideA.player.id);
    }
    for (const { player } of [sideA, sideB]) {
      if (this.playerToMatch.has(player.id)) {
        throw new DuplicateParticipantError(player.id);
      }
    }

    const matchId = randomUUID();
    const engine = new MatchEngine(
      matchId,
      sideA,
      sideB,
      this.config,
      {
        send: (sessionId, message) => {
          this.sessions.send(sessionId, message);
        },
        onStarted: (id) => {
          const payload: MatchStartedPayload = { matchId: id };
          this.eventEmitter.emit(EVENTS.MATCH_STARTED, payload);
        },
        onEnded: (result) => this.handleEnded(engine, result),
      },
      this.logger,
    );

    this.matches.set(matchId, engine);
    this.sessionToMatch.set(sideA.sessionId, matchId);
    this.sessionToMatch.set(sideB.sessionId, matchId);
    this.playerToMatch.set(sideA.player.id, matchId);
    this.playerToMatch.set(sideB.player.id, matchId);

    const [channelA, channelB] = engine.channels;
    this.addRoute(channelA, { matchId, side: MatchSide.PLAYER1 });
    this.addRoute(channelB, { matchId, side: MatchSide.PLAYER2 });

    engine.open();

    this.logger.log(
      `Match ${matchId} created: ${sideA.player.id} vs ${sideB.player.id}`,
      MatchRegistryService.name,
    );

    const payload: MatchCreatedPayload = {
      matchId,
      channels: [channelA, channelB],
    };
    this.eventEmitter.emit(EVENTS.MATCH_CREATED, payload);

    return matchId;
  }

  routeReady(sessionId: string): void {
    this.engineForSession(sessionId).dispatch({ type: 'ready', sessionId });
  }

  routePull(
    matchId: string,
    side: MatchSide,
    viewerId: string,
    at: number,
  ): void {
    const engine = this.matches.get(matchId);
    if (!engine) throw new UnknownMatchError(matchId);
    engine.dispatch({ type: 'pull', side, viewerId, at });
  }

  routeDisconnect(sessionId: string): void {
    this.engineForSession(sessionId).dispatch({
      type: 'disconnect',
      sessionId,
    });
  }

  /**
   * Forwards a chat pull to every side fed by the channel.
   * @returns false when no live match listens to the channel
   */
  routeChatCommand(channel: string, viewerId: string, at: number): boolean {
    const routes = this.channelRoutes.get(channel.toLowerCase());
    if (!routes || routes.length === 0) return false;

    for (const { matchId, side } of [...routes]) {
      this.routePull(matchId, side, viewerId, at);
    }
    return true;
  }

  get(matchId: string): MatchEngine | undefined {
    return this.matches.get(matchId);
  }

  list(): MatchEngine[] {
    return [...this.matches.values()];
  }

  matchIdForSession(sessionId: string): string | undefined {
    return this.sessionToMatch.get(sessionId);
  }

  hasSession(sessionId: string): boolean {
    return this.sessionToMatch.has(sessionId);
  }

  hasPlayer(playerId: string): boolean {
    return this.playerToMatch.has(playerId);
  }

  size(): number {
    return this.matches.size;
  }

  onModuleDestroy() {
    for (const engine of this.matches.values()) engine.dispose();
    this.matches.clear();
    this.sessionToMatch.clear();
    this.playerToMatch.clear();
    this.channelRoutes.clear();
  }

  private engineForSession(sessionId: string): MatchEngine {
    const matchId = this.sessionToMatch.get(sessionId);
    const engine = matchId ? this.matches.get(matchId) : undefined;
    if (!engine) throw new UnknownSessionError(sessionId);
    return engine;
  }

  private addRoute(channel: string, route: ChannelRoute): void {
    const routes = this.channelRoutes.get(channel) ?? [];
    routes.push(route);
    this.channelRoutes.set(channel, routes);
  }

  private handleEnded(engine: MatchEngine, result: MatchResult): void {
    const matchId = engine.id;

    this.matches.delete(matchId);
    for (const { sessionId, player } of engine.participants) {
      if (this.sessionToMatch.get(sessionId) === matchId) {
        this.sessionToMatch.delete(sessionId);
      }
      if (this.playerToMatch.get(player.id) === matchId) {
        this.playerToMatch.delete(player.id);
      }
    }

    const channels = engine.channels;
    for (const channel of channels) {
      const remaining = (this.channelRoutes.get(channel) ?? []).filter(
        (r) => r.matchId !== matchId,
      );
      if (remaining.length > 0) this.channelRoutes.set(channel, remaining);
      else this.channelRoutes.delete(channel);
    }

    const payload: MatchEndedPayload = {
      matchId,
      channels: [...channels],
      result,
    };
    this.eventEmitter.emit(EVENTS.MATCH_ENDED, payload);
  }
}
