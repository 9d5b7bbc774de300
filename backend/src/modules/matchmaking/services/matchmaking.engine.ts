import { randomUUID } from 'crypto';
import { AlreadyQueuedError } from '@/common/errors/game.errors';
import { LoggerService } from '@/shared/logger/logger.service';
import { MatchPair, QueueEntry } from '../types/matchmaking.types';

export class MatchmakingEngine {
  // waiting streamers, kept in arrival order
  private queue: QueueEntry[] = [];

  constructor(private readonly logger: LoggerService) {}

  /**
   * Adds a player to the matchmaking queue. (enqueue)
   * Throws AlreadyQueuedError if the player or the session is already waiting.
   */
  addPlayer(entry: QueueEntry): void {
    const duplicate = this.queue.some(
      (e) =>
        e.player.id === entry.player.id || e.sessionId === entry.sessionId,
    );
    if (duplicate) throw new AlreadyQueuedError(entry.player.id);

    // out-of-order joins still land by joinedAt
    let i = this.queue.length;
    while (i > 0 && this.queue[i - 1].joinedAt > entry.joinedAt) i--;
    this.queue.splice(i, 0, entry);

    this.logger.debug(
      `Player ${entry.player.id} added to matchmaking queue.`,
      MatchmakingEngine.name,
    );
  }

  /**
   * Removes the session's entry from the matchmaking queue. (dequeue)
   * @returns the removed entry, or undefined when nothing was waiting
   */
  removeSession(sessionId: string): QueueEntry | undefined {
    return this.removeWhere((e) => e.sessionId === sessionId);
  }

  /**
   * Pairs the two earliest entries until fewer than two remain. The first of
   * each pair becomes side A.
   */
  match(): MatchPair[] {
    const results: MatchPair[] = [];
    const now = Date.now();

    while (this.queue.length >= 2) {
      const [sideA, sideB] = this.queue.splice(0, 2);
      results.push({ pairId: randomUUID(), sideA, sideB, createdAt: now });

      this.logger.debug(
        `Paired ${sideA.player.id} vs ${sideB.player.id} | waited=${
          now - sideA.joinedAt
        }ms`,
        MatchmakingEngine.name,
      );
    }

    return results;
  }

  has(playerId: string): boolean {
    return this.queue.some((e) => e.player.id === playerId);
  }

  size(): number {
    return this.queue.length;
  }

  getQueue(): QueueEntry[] {
    return [...this.queue];
  }

  private removeWhere(
    predicate: (entry: QueueEntry) => boolean,
  ): QueueEntry | undefined {
    const index = this.queue.findIndex(predicate);
    if (index === -1) return undefined;

    const [removed] = this.queue.splice(index, 1);
    this.logger.debug(
      `Player ${removed.player.id} removed from matchmaking queue.`,
      MatchmakingEngine.name,
    );
    return removed;
  }
}
