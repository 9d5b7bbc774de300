import {
  MatchEndReason,
  MatchSide,
  WireMatchStatus,
} from '@/common/enums';
import { MatchStats, OutboundMessage } from '@/events/types/messages.types';
import { Player } from '@/modules/matchmaking/types/matchmaking.types';
import { PullAggregator } from '../engine/pull-aggregator';

export interface Participant {
  player: Player;
  sessionId: string;
}

export interface SideState {
  side: MatchSide;
  participant: Participant;
  pulls: PullAggregator;
  ready: boolean;
  connected: boolean;
  // values from the most recent tick
  lastEngagementRate: number;
  lastUniquePullers: number;
  lastPullPower: number;
}

/** Everything a match reacts to, serialized through MatchEngine.dispatch */
export type MatchCommand =
  | { type: 'ready'; sessionId: string }
  | { type: 'pull'; side: MatchSide; viewerId: string; at: number }
  | { type: 'disconnect'; sessionId: string };

export interface MatchResult {
  matchId: string;
  reason: MatchEndReason;
  /** null on a draw, or when nobody is left */
  winner: Player | null;
  stats: MatchStats;
}

export interface MatchHooks {
  send(sessionId: string, message: OutboundMessage): void;
  onStarted?(matchId: string): void;
  onEnded(result: MatchResult): void;
}

export interface MatchParticipantSummary {
  id: string;
  username: string;
  channel_name: string;
  viewer_count: number;
}

export interface MatchSummary {
  room_id: string;
  status: WireMatchStatus;
  rope_position: number;
  time_remaining: number;
  created_at: string;
  player1: MatchParticipantSummary;
  player2: MatchParticipantSummary;
}

export interface ChannelRoute {
  matchId: string;
  side: MatchSide;
}

export interface MatchCreatedPayload {
  matchId: string;
  channels: string[];
}

export interface MatchStartedPayload {
  matchId: string;
}

export interface MatchEndedPayload {
  matchId: string;
  channels: string[];
  result: MatchResult;
}
