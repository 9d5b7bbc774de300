import { Injectable } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  DeliveryFailedError,
  UnknownSessionError,
} from '@/common/errors/game.errors';
import { EVENTS } from '@/events/events.constant';
import { OutboundMessage } from '@/events/types/messages.types';
import { Player } from '@/modules/matchmaking/types/matchmaking.types';
import { LoggerService } from '@/shared/logger/logger.service';
import {
  DeliveryResult,
  SessionConnection,
  SessionDeliveryFailedPayload,
  SessionEntry,
} from './types/session.types';

@Injectable()
export class SessionRegistryService {
  private readonly sessions = new Map<string, SessionEntry>();

  constructor(
    private readonly logger: LoggerService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /** Binds a connection to the session id, replacing any previous one. */
  register(sessionId: string, connection: SessionConnection): void {
    const existing = this.sessions.get(sessionId);
    this.sessions.set(sessionId, { connection, player: existing?.player });
    this.logger.debug(
      `Session ${sessionId} ${existing ? 're-registered' : 'registered'}`,
      SessionRegistryService.name,
    );
  }

  attachPlayer(sessionId: string, player: Player): void {
    const entry = this.sessions.get(sessionId);
    if (!entry) throw new UnknownSessionError(sessionId);
    entry.player = player;
  }

  connectionOf(sessionId: string): SessionConnection | undefined {
    return this.sessions.get(sessionId)?.connection;
  }

  getPlayer(sessionId: string): Player | undefined {
    return this.sessions.get(sessionId)?.player;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  size(): number {
    return this.sessions.size;
  }

  /**
   * Best-effort delivery. Failures are reported in the result, never thrown,
   * and announced on SESSION_DELIVERY_FAILED so a live match can forfeit.
   */
  send(sessionId: string, message: OutboundMessage): DeliveryResult {
    const entry = this.sessions.get(sessionId);
    let reason: string | null = null;

    if (!entry) {
      reason = 'unknown session';
    } else if (!entry.connection.connected) {
      reason = 'connection closed';
    } else {
      try {
        entry.connection.send(message);
      } catch (error) {
        reason = error instanceof Error ? error.message : String(error);
      }
    }

    if (reason === null) return { ok: true };

    const error = new DeliveryFailedError(sessionId, reason);
    this.logger.warn(
      `${error.message} (message: ${message.type})`,
      SessionRegistryService.name,
    );

    const payload: SessionDeliveryFailedPayload = { sessionId };
    this.eventEmitter.emit(EVENTS.SESSION_DELIVERY_FAILED, payload);

    return { ok: false, error };
  }

  unregister(sessionId: string): void {
    if (this.sessions.delete(sessionId)) {
      this.logger.debug(
        `Session ${sessionId} unregistered`,
        SessionRegistryService.name,
      );
    }
  }
}
