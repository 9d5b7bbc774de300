import {
  Inject,
  Injectable,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  AlreadyQueuedError,
  UnknownSessionError,
} from '@/common/errors/game.errors';
import { EVENTS } from '@/events/events.constant';
import { MatchRegistryService } from '@/modules/match/match-registry.service';
import { SessionRegistryService } from '@/modules/session/session-registry.service';
import { LoggerService } from '@/shared/logger/logger.service';
import { MatchFoundEvent } from '../match-found.event';
import {
  MATCHMAKING_CONFIG,
  MatchmakingConfig,
  Player,
  QueueEntry,
} from '../types/matchmaking.types';
import { MatchmakingEngine } from './matchmaking.engine';

@Injectable()
export class MatchmakingService implements OnModuleInit, OnModuleDestroy {
  private engine: MatchmakingEngine;
  private ticker: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly logger: LoggerService,
    private readonly eventEmitter: EventEmitter2,
    private readonly sessions: SessionRegistryService,
    private readonly matches: MatchRegistryService,
    @Inject(MATCHMAKING_CONFIG)
    private readonly config: MatchmakingConfig,
  ) {
    this.engine = new MatchmakingEngine(this.logger);
  }

  onModuleInit() {
    this.start();
  }
  onModuleDestroy() {
    this.stop();
  }

  start() {
    if (this.ticker) return;
    this.ticker = setInterval(() => {
      try {
        this.pair();
      } catch (err) {
        this.logger.error(
          'Matchmaking tick error',
          err,
          MatchmakingService.name,
        );
      }
    }, this.config.intervalMs);
    this.logger.debug('MatchmakingService started', MatchmakingService.name);
  }

  stop() {
    if (this.ticker) {
      clearInterval(this.ticker);
      this.ticker = null;
      this.logger.debug('MatchmakingService stopped.', MatchmakingService.name);
    }
  }

  /**
   * Queues the session's player and runs a pairing pass right away.
   * Throws AlreadyQueuedError when the player or session is already waiting
   * or playing.
   */
  join(sessionId: string, player: Player): void {
    if (
      this.engine.has(player.id) ||
      this.matches.hasPlayer(player.id) ||
      this.matches.hasSession(sessionId)
    ) {
      throw new AlreadyQueuedError(player.id);
    }

    if (!this.sessions.has(sessionId)) throw new UnknownSessionError(sessionId);

    // the session is only bound to the player once the entry is queued
    this.engine.addPlayer({ player, sessionId, joinedAt: Date.now() });
    this.sessions.attachPlayer(sessionId, player);
    this.sessions.send(sessionId, { type: 'queue_joined' });

    this.pair();
  }

  /** Leaves the queue; `queue_left` is sent even when nothing was queued. */
  leave(sessionId: string): void {
    this.engine.removeSession(sessionId);
    this.sessions.send(sessionId, { type: 'queue_left' });
  }

  /** Silent removal, for sessions that are already gone. */
  remove(sessionId: string): QueueEntry | undefined {
    return this.engine.removeSession(sessionId);
  }

  getQueue(): QueueEntry[] {
    return this.engine.getQueue();
  }

  size(): number {
    return this.engine.size();
  }

  // a pass can be triggered by join() from inside a match-found listener
  private pair() {
    if (this.running) return;
    this.running = true;

    try {
      const pairs = this.engine.match();

      // pair found, emit event for match creation
      for (const pair of pairs) {
        this.eventEmitter.emit(EVENTS.MATCH_FOUND, new MatchFoundEvent(pair));
        this.logger.log(
          `Match event emitted: ${pair.pairId}`,
          MatchmakingService.name,
        );
      }
    } finally {
      this.running = false;
    }
  }
}
