import { DeliveryFailedError } from '@/common/errors/game.errors';
import { OutboundMessage } from '@/events/types/messages.types';
import { Player } from '@/modules/matchmaking/types/matchmaking.types';

/**
 * Outbound side of a client connection. The gateway wraps a socket.io
 * socket in one of these; tests pass plain objects.
 */
export interface SessionConnection {
  readonly connected: boolean;
  send(message: OutboundMessage): void;
}

export interface SessionEntry {
  connection: SessionConnection;
  player?: Player;
}

export type DeliveryResult =
  | { ok: true }
  | { ok: false; error: DeliveryFailedError };

export interface SessionDeliveryFailedPayload {
  sessionId: string;
}
