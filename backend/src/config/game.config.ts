import { registerAs } from '@nestjs/config';

export interface GameConfig {
  /** Length of a match once it is in progress (ms) */
  durationMs: number;
  /** Rope update / broadcast cadence (ms) */
  tickIntervalMs: number;
  /** How long a freshly paired match waits for both `game_ready` acks (ms) */
  readyGracePeriodMs: number;
  /** Sliding window for unique pullers (ms) */
  pullWindowMs: number;
  baseStrength: number;
  tickScale: number;
  /** Rope boundary; reaching +/- this value wins */
  winThreshold: number;
  /** Safety pairing pass cadence (ms) */
  matchmakingIntervalMs: number;
}

export const DEFAULT_GAME_CONFIG: GameConfig = {
  durationMs: 120_000,
  tickIntervalMs: 1_000,
  readyGracePeriodMs: 10_000,
  pullWindowMs: 30_000,
  baseStrength: 1,
  tickScale: 10,
  winThreshold: 100,
  matchmakingIntervalMs: 1_000,
};

export const gameConfig = registerAs(
  'game',
  (): GameConfig => ({
    durationMs:
      parseInt(process.env.GAME_DURATION_SECONDS || '120', 10) * 1_000,
    tickIntervalMs: parseInt(process.env.GAME_TICK_INTERVAL_MS || '1000', 10),
    readyGracePeriodMs: parseInt(
      process.env.GAME_READY_GRACE_MS || '10000',
      10,
    ),
    pullWindowMs: parseInt(process.env.GAME_PULL_WINDOW_MS || '30000', 10),
    baseStrength: parseFloat(process.env.GAME_BASE_STRENGTH || '1'),
    tickScale: parseFloat(process.env.GAME_TICK_SCALE || '10'),
    winThreshold: DEFAULT_GAME_CONFIG.winThreshold,
    matchmakingIntervalMs: parseInt(
      process.env.MATCHMAKING_INTERVAL_MS || '1000',
      10,
    ),
  }),
);
