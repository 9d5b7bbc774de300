import { LoggerService } from '@/shared/logger/logger.service';
import { Injectable } from '@nestjs/common';
import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  SubscribeMessage,
  WebSocketGateway,
  WebSocketServer,
} from '@nestjs/websockets';
import { Server, Socket } from 'socket.io';
import { SessionRegistryService } from '@/modules/session/session-registry.service';
import { SessionConnection } from '@/modules/session/types/session.types';
import { WS_MESSAGE_EVENT } from './events.constant';
import { parseClientMessage } from './dto/client-message.dto';
import { InboundDispatcher, toInboundEvent } from './inbound.dispatcher';
import { OutboundMessage } from './types/messages.types';

export class SocketConnection implements SessionConnection {
  constructor(private readonly socket: Socket) {}

  get socketId(): string {
    return this.socket.id;
  }

  get connected(): boolean {
    return this.socket.connected;
  }

  send(message: OutboundMessage): void {
    this.socket.emit(WS_MESSAGE_EVENT, message);
  }
}

/** Session id from the `session_id` handshake query, else the socket id. */
export function sessionIdOf(client: Socket): string {
  const raw = client.handshake.query.session_id;
  const value = Array.isArray(raw) ? raw[0] : raw;
  return typeof value === 'string' && value.length > 0 ? value : client.id;
}

@WebSocketGateway({
  cors: { origin: '*' },
})
@Injectable()
export class EventsGateway implements OnGatewayConnection, OnGatewayDisconnect {
  @WebSocketServer()
  server!: Server;

  constructor(
    private readonly logger: LoggerService,
    private readonly sessions: SessionRegistryService,
    private readonly dispatcher: InboundDispatcher,
  ) {}

  handleConnection(client: Socket) {
    const sessionId = sessionIdOf(client);
    this.sessions.register(sessionId, new SocketConnection(client));

    this.logger.log(
      `Client connected: ${client.id} (session: ${sessionId})`,
      EventsGateway.name,
    );
  }

  handleDisconnect(client: Socket) {
    const sessionId = sessionIdOf(client);
    this.logger.log(`Client disconnected: ${client.id}`, EventsGateway.name);

    // the session was taken over by a newer socket
    const current = this.sessions.connectionOf(sessionId);
    if (current instanceof SocketConnection && current.socketId !== client.id) {
      return;
    }

    this.dispatcher.dispatch({ kind: 'disconnect', sessionId });
  }

  @SubscribeMessage(WS_MESSAGE_EVENT)
  handleMessage(@ConnectedSocket() client: Socket, @MessageBody() body: unknown) {
    const message = parseClientMessage(body);
    if (!message) {
      this.logger.debug(
        `Dropped malformed message from ${client.id}`,
        EventsGateway.name,
      );
      return;
    }

    this.dispatcher.dispatch(toInboundEvent(sessionIdOf(client), message));
  }
}
