import {
  MatchEndReason,
  MatchSide,
  WireMatchStatus,
} from '@/common/enums';

export interface OpponentInfo {
  id: string;
  username: string;
  channel_name: string;
  profile_image: string;
  viewer_count: number;
}

/** Snapshot pushed on every tick, also served by `GET /matches/:id` */
export interface GameStateMessage {
  room_id: string;
  rope_position: number;
  /** cumulative pulls, not the window count */
  player1_score: number;
  player2_score: number;
  player1_engagement: number;
  player2_engagement: number;
  /** whole seconds */
  time_remaining: number;
  status: WireMatchStatus;
}

export interface SideStats {
  player_id: string;
  username: string;
  total_pulls: number;
  unique_pullers: number;
  engagement_rate: number;
  pull_power: number;
}

export interface MatchStats {
  room_id: string;
  reason: MatchEndReason;
  rope_position: number;
  duration_ms: number;
  player1: SideStats;
  player2: SideStats;
}

export type QueueJoinedMessage = { type: 'queue_joined' };
export type QueueLeftMessage = { type: 'queue_left' };

export interface MatchFoundMessage {
  type: 'match_found';
  room_id: string;
  side: MatchSide;
  opponent: OpponentInfo;
}

export interface GameStartedMessage {
  type: 'game_started';
  room_id: string;
}

export interface GameUpdateMessage {
  type: 'game_update';
  state: GameStateMessage;
}

export interface GameEndedMessage {
  type: 'game_ended';
  /** null on a draw */
  winner: string | null;
  stats: MatchStats;
}

export type OutboundMessage =
  | QueueJoinedMessage
  | QueueLeftMessage
  | MatchFoundMessage
  | GameStartedMessage
  | GameUpdateMessage
  | GameEndedMessage;
