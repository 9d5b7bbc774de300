export type GameErrorCode =
  | 'ALREADY_QUEUED'
  | 'DUPLICATE_PARTICIPANT'
  | 'UNKNOWN_MATCH'
  | 'UNKNOWN_SESSION'
  | 'DELIVERY_FAILED';

/**
 * Recoverable, local failure of a game operation. Callers log and drop these;
 * none of them is fatal to the process.
 */
export abstract class GameError extends Error {
  abstract readonly code: GameErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class AlreadyQueuedError extends GameError {
  readonly code = 'ALREADY_QUEUED';

  constructor(readonly playerId: string) {
    super(`Player ${playerId} is already queued or in a match`);
  }
}

export class DuplicateParticipantError extends GameError {
  readonly code = 'DUPLICATE_PARTICIPANT';

  constructor(readonly playerId: string) {
    super(`Player ${playerId} already has a live match`);
  }
}

export class UnknownMatchError extends GameError {
  readonly code = 'UNKNOWN_MATCH';

  constructor(readonly matchId: string) {
    super(`Match ${matchId} not found`);
  }
}

export class UnknownSessionError extends GameError {
  readonly code = 'UNKNOWN_SESSION';

  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} is not registered or not in a match`);
  }
}

export class DeliveryFailedError extends GameError {
  readonly code = 'DELIVERY_FAILED';

  constructor(
    readonly sessionId: string,
    reason: string,
  ) {
    super(`Delivery to session ${sessionId} failed: ${reason}`);
  }
}
