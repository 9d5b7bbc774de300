/**
 * Player identity snapshot resolved at login. The engine treats it as
 * read-only for the lifetime of a match.
 */
export interface Player {
  id: string;
  username: string;
  profile_image: string;
  viewer_count: number;
  /** Chat channel login; defaults to the lower-cased username */
  channel_name?: string;
}

/**
 * QueueEntry represents a streamer waiting to be paired.
 */
export interface QueueEntry {
  player: Player;
  sessionId: string;
  joinedAt: number; // timestamp (ms)
}

/**
 * MatchPair is the matchmaking final result: the two earliest entries,
 * in side order (first = side A / player1).
 */
export interface MatchPair {
  pairId: string;
  sideA: QueueEntry;
  sideB: QueueEntry;
  createdAt: number;
}

export function channelOf(player: Player): string {
  return (player.channel_name || player.username).toLowerCase();
}

export interface MatchmakingConfig {
  /** Safety pairing pass cadence (ms) */
  intervalMs: number;
}

export const MATCHMAKING_CONFIG = 'MATCHMAKING_CONFIG';
