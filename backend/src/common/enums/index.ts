export enum MatchState {
  PENDING_READY = 'PENDING_READY',
  IN_PROGRESS = 'IN_PROGRESS',
  ENDED = 'ENDED',
}

export enum MatchEndReason {
  ROPE_REACHED_BOUNDARY = 'rope_reached_boundary',
  TIME_EXPIRED = 'time_expired',
  OPPONENT_DISCONNECTED = 'opponent_disconnected',
}

/**
 * Side labels as sent to clients. PLAYER1 (side A) wins at +100,
 * PLAYER2 (side B) wins at -100.
 */
export enum MatchSide {
  PLAYER1 = 'player1',
  PLAYER2 = 'player2',
}

/** Match status as the presentation layer knows it. */
export enum WireMatchStatus {
  WAITING = 'waiting',
  ACTIVE = 'active',
  FINISHED = 'finished',
  ABANDONED = 'abandoned',
}
