import {
  MatchEndReason,
  MatchSide,
  MatchState,
  WireMatchStatus,
} from '@/common/enums';
import { GameConfig } from '@/config/game.config';
import {
  GameStateMessage,
  OutboundMessage,
  SideStats,
} from '@/events/types/messages.types';
import { channelOf } from '@/modules/matchmaking/types/matchmaking.types';
import { LoggerService } from '@/shared/logger/logger.service';
import {
  clampRope,
  computeDisplacement,
  computePullPower,
} from '../utils/fairness.util';
import {
  MatchCommand,
  MatchHooks,
  MatchResult,
  MatchSummary,
  Participant,
  SideState,
} from '../types/match.types';
import { PullAggregator } from './pull-aggregator';

/**
 * One live match. Owns its rope, pull windows, state and timers, and is the
 * only writer of them: inbound commands go through `dispatch`, the rope only
 * moves inside `tick`.
 *
 * PENDING_READY -> IN_PROGRESS -> ENDED
 */
export class MatchEngine {
  readonly createdAt = Date.now();

  private state = MatchState.PENDING_READY;
  private endReason: MatchEndReason | null = null;
  private ropePosition = 0;
  private startedAt: number | null = null;
  private endedAt: number | null = null;

  private readonly sides: Record<MatchSide, SideState>;
  private graceTimer: NodeJS.Timeout | null = null;
  private tickTimer: NodeJS.Timeout | null = null;

  constructor(
    readonly id: string,
    sideA: Participant,
    sideB: Participant,
    private readonly config: GameConfig,
    private readonly hooks: MatchHooks,
    private readonly logger: LoggerService,
  ) {
    this.sides = {
      [MatchSide.PLAYER1]: this.createSide(MatchSide.PLAYER1, sideA),
      [MatchSide.PLAYER2]: this.createSide(MatchSide.PLAYER2, sideB),
    };
  }

  /** Starts the ready grace period. */
  open(): void {
    if (this.graceTimer || this.state !== MatchState.PENDING_READY) return;
    this.graceTimer = setTimeout(
      () => this.guard('grace', () => this.onGraceExpired()),
      this.config.readyGracePeriodMs,
    );
  }

  dispatch(command: MatchCommand): void {
    if (this.state === MatchState.ENDED) return;

    switch (command.type) {
      case 'ready':
        this.markReady(command.sessionId);
        break;
      case 'pull':
        // pulls before the start whistle do not count
        if (this.state !== MatchState.IN_PROGRESS) return;
        this.sides[command.side].pulls.recordPull(command.viewerId, command.at);
        break;
      case 'disconnect':
        this.markDisconnected(command.sessionId);
        break;
    }
  }

  get currentState(): MatchState {
    return this.state;
  }

  get rope(): number {
    return this.ropePosition;
  }

  get participants(): [Participant, Participant] {
    return [
      this.sides[MatchSide.PLAYER1].participant,
      this.sides[MatchSide.PLAYER2].participant,
    ];
  }

  get channels(): [string, string] {
    const [a, b] = this.participants;
    return [channelOf(a.player), channelOf(b.player)];
  }

  sideOf(sessionId: string): SideState | undefined {
    return Object.values(this.sides).find(
      (s) => s.participant.sessionId === sessionId,
    );
  }

  snapshot(now = Date.now()): GameStateMessage {
    const a = this.sides[MatchSide.PLAYER1];
    const b = this.sides[MatchSide.PLAYER2];

    return {
      room_id: this.id,
      rope_position: this.ropePosition,
      player1_score: a.pulls.totalPulls,
      player2_score: b.pulls.totalPulls,
      player1_engagement: a.lastEngagementRate,
      player2_engagement: b.lastEngagementRate,
      time_remaining: this.timeRemaining(now),
      status: this.wireStatus(),
    };
  }

  summary(now = Date.now()): MatchSummary {
    const describe = (s: SideState) => ({
      id: s.participant.player.id,
      username: s.participant.player.username,
      channel_name: channelOf(s.participant.player),
      viewer_count: s.participant.player.viewer_count,
    });

    return {
      room_id: this.id,
      status: this.wireStatus(),
      rope_position: this.ropePosition,
      time_remaining: this.timeRemaining(now),
      created_at: new Date(this.createdAt).toISOString(),
      player1: describe(this.sides[MatchSide.PLAYER1]),
      player2: describe(this.sides[MatchSide.PLAYER2]),
    };
  }

  /** Stops every timer without announcing anything. */
  dispose(): void {
    this.clearTimers();
  }

  // ============== STATE TRANSITIONS ==============

  private markReady(sessionId: string): void {
    const side = this.sideOf(sessionId);
    if (!side || this.state !== MatchState.PENDING_READY) return;
    // a side that dropped stays out; the grace deadline settles the match
    if (!side.connected) {
      this.logger.debug(
        `Match ${this.id}: ignoring ready from disconnected ${side.side}`,
        MatchEngine.name,
      );
      return;
    }

    side.ready = true;
    this.logger.debug(
      `Match ${this.id}: ${side.side} ready`,
      MatchEngine.name,
    );

    if (this.bothSides().every((s) => s.ready)) this.start();
  }

  private markDisconnected(sessionId: string): void {
    const side = this.sideOf(sessionId);
    if (!side) return;

    side.connected = false;

    if (this.state === MatchState.IN_PROGRESS) {
      this.end(MatchEndReason.OPPONENT_DISCONNECTED, this.opposite(side.side));
      return;
    }

    // pending: readiness is forfeited, the grace timer settles the rest
    side.ready = false;
    if (this.bothSides().every((s) => !s.connected)) {
      this.end(MatchEndReason.OPPONENT_DISCONNECTED, null);
    }
  }

  private onGraceExpired(): void {
    this.graceTimer = null;
    if (this.state !== MatchState.PENDING_READY) return;

    const present = this.bothSides().filter((s) => s.connected);
    if (present.length === 2) {
      this.logger.debug(
        `Match ${this.id}: grace period over, starting without all acks`,
        MatchEngine.name,
      );
      this.start();
      return;
    }

    this.end(
      MatchEndReason.OPPONENT_DISCONNECTED,
      present.length === 1 ? present[0].side : null,
    );
  }

  private start(): void {
    this.clearTimers();
    this.state = MatchState.IN_PROGRESS;
    this.startedAt = Date.now();

    this.broadcast({ type: 'game_started', room_id: this.id });
    this.hooks.onStarted?.(this.id);

    this.tickTimer = setInterval(
      () => this.guard('tick', () => this.tick()),
      this.config.tickIntervalMs,
    );
    this.logger.log(`Match ${this.id} started`, MatchEngine.name);
  }

  private tick(): void {
    if (this.state !== MatchState.IN_PROGRESS || this.startedAt === null) {
      return;
    }
    const now = Date.now();

    for (const side of this.bothSides()) {
      const unique = side.pulls.uniquePullers(now);
      const rate = side.pulls.engagementRate(
        now,
        side.participant.player.viewer_count,
      );
      side.lastUniquePullers = unique;
      side.lastEngagementRate = rate;
      side.lastPullPower = computePullPower(
        rate,
        unique,
        this.config.baseStrength,
      );
    }

    const displacement = computeDisplacement(
      this.sides[MatchSide.PLAYER1].lastPullPower,
      this.sides[MatchSide.PLAYER2].lastPullPower,
      this.config.tickScale,
    );
    this.ropePosition = clampRope(
      this.ropePosition + displacement,
      this.config.winThreshold,
    );

    if (this.ropePosition >= this.config.winThreshold) {
      this.end(MatchEndReason.ROPE_REACHED_BOUNDARY, MatchSide.PLAYER1, now);
    } else if (this.ropePosition <= -this.config.winThreshold) {
      this.end(MatchEndReason.ROPE_REACHED_BOUNDARY, MatchSide.PLAYER2, now);
    } else if (now - this.startedAt >= this.config.durationMs) {
      const winner =
        this.ropePosition > 0
          ? MatchSide.PLAYER1
          : this.ropePosition < 0
            ? MatchSide.PLAYER2
            : null;
      this.end(MatchEndReason.TIME_EXPIRED, winner, now);
    } else {
      this.broadcast({ type: 'game_update', state: this.snapshot(now) });
    }
  }

  private end(
    reason: MatchEndReason,
    winner: MatchSide | null,
    now = Date.now(),
  ): void {
    if (this.state === MatchState.ENDED) return;

    this.state = MatchState.ENDED;
    this.endReason = reason;
    this.endedAt = now;
    this.clearTimers();

    const result: MatchResult = {
      matchId: this.id,
      reason,
      winner: winner ? this.sides[winner].participant.player : null,
      stats: {
        room_id: this.id,
        reason,
        rope_position: this.ropePosition,
        duration_ms: this.startedAt === null ? 0 : now - this.startedAt,
        player1: this.sideStats(this.sides[MatchSide.PLAYER1]),
        player2: this.sideStats(this.sides[MatchSide.PLAYER2]),
      },
    };

    this.broadcast({ type: 'game_update', state: this.snapshot(now) });
    this.broadcast({
      type: 'game_ended',
      winner: result.winner?.id ?? null,
      stats: result.stats,
    });

    this.logger.log(
      `Match ${this.id} ended: ${reason}, winner=${result.winner?.id ?? 'none'}`,
      MatchEngine.name,
    );
    this.hooks.onEnded(result);
  }

  // ============== HELPERS ==============

  private createSide(side: MatchSide, participant: Participant): SideState {
    return {
      side,
      participant,
      pulls: new PullAggregator(this.config.pullWindowMs),
      ready: false,
      connected: true,
      lastEngagementRate: 0,
      lastUniquePullers: 0,
      lastPullPower: 0,
    };
  }

  private bothSides(): SideState[] {
    return [this.sides[MatchSide.PLAYER1], this.sides[MatchSide.PLAYER2]];
  }

  private opposite(side: MatchSide): MatchSide {
    return side === MatchSide.PLAYER1 ? MatchSide.PLAYER2 : MatchSide.PLAYER1;
  }

  private broadcast(message: OutboundMessage): void {
    for (const side of this.bothSides()) {
      if (side.connected) this.hooks.send(side.participant.sessionId, message);
    }
  }

  private sideStats(side: SideState): SideStats {
    return {
      player_id: side.participant.player.id,
      username: side.participant.player.username,
      total_pulls: side.pulls.totalPulls,
      unique_pullers: side.lastUniquePullers,
      engagement_rate: side.lastEngagementRate,
      pull_power: side.lastPullPower,
    };
  }

  private timeRemaining(now: number): number {
    switch (this.state) {
      case MatchState.PENDING_READY:
        return Math.floor(this.config.durationMs / 1000);
      case MatchState.ENDED:
        return 0;
      default: {
        const elapsed = now - (this.startedAt ?? now);
        return Math.max(
          0,
          Math.floor((this.config.durationMs - elapsed) / 1000),
        );
      }
    }
  }

  private wireStatus(): WireMatchStatus {
    switch (this.state) {
      case MatchState.PENDING_READY:
        return WireMatchStatus.WAITING;
      case MatchState.IN_PROGRESS:
        return WireMatchStatus.ACTIVE;
      default:
        return this.endReason === MatchEndReason.OPPONENT_DISCONNECTED
          ? WireMatchStatus.ABANDONED
          : WireMatchStatus.FINISHED;
    }
  }

  private clearTimers(): void {
    if (this.graceTimer) {
      clearTimeout(this.graceTimer);
      this.graceTimer = null;
    }
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }
  }

  // timer callbacks must never throw into the event loop
  private guard(label: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.logger.error(
        `Match ${this.id} ${label} failed`,
        error instanceof Error ? error.stack : String(error),
        MatchEngine.name,
      );
    }
  }
}
