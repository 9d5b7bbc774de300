import { Player } from '@/modules/matchmaking/types/matchmaking.types';

export interface JoinQueueEvent {
  kind: 'join_queue';
  sessionId: string;
  player: Player;
}

export interface LeaveQueueEvent {
  kind: 'leave_queue';
  sessionId: string;
}

export interface GameReadyEvent {
  kind: 'game_ready';
  sessionId: string;
  roomId?: string;
}

/** A pull command seen in a streamer's chat */
export interface ChatPullEvent {
  kind: 'chat_pull';
  channel: string;
  viewerId: string;
  at: number;
}

export interface DisconnectEvent {
  kind: 'disconnect';
  sessionId: string;
}

export type InboundEvent =
  | JoinQueueEvent
  | LeaveQueueEvent
  | GameReadyEvent
  | ChatPullEvent
  | DisconnectEvent;
