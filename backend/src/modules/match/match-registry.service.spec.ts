import { EventEmitter2 } from '@nestjs/event-emitter';
import { MatchEndReason, MatchSide, MatchState } from '@/common/enums';
import {
  DuplicateParticipantError,
  UnknownMatchError,
  UnknownSessionError,
} from '@/common/errors/game.errors';
import { DEFAULT_GAME_CONFIG } from '@/config/game.config';
import { EVENTS } from '@/events/events.constant';
import { OutboundMessage } from '@/events/types/messages.types';
import { SessionRegistryService } from '@/modules/session/session-registry.service';
import { LoggerService } from '@/shared/logger/logger.service';
import { MatchRegistryService } from './match-registry.service';
import { MatchCreatedPayload, MatchEndedPayload, Participant } from './types/match.types';

const sideA: Participant = {
  sessionId: 'sA',
  player: {
    id: 'a',
    username: 'Alpha',
    profile_image: '',
    viewer_count: 10,
    channel_name: 'AlphaTV',
  },
};
const sideB: Participant = {
  sessionId: 'sB',
  player: { id: 'b', username: 'Beta', profile_image: '', viewer_count: 10 },
};

describe('MatchRegistryService', () => {
  let emitter: EventEmitter2;
  let sessions: SessionRegistryService;
  let registry: MatchRegistryService;
  let inbox: Record<string, OutboundMessage[]>;

  beforeEach(() => {
    jest.useFakeTimers();
    const logger = new LoggerService();
    emitter = new EventEmitter2();
    sessions = new SessionRegistryService(logger, emitter);
    registry = new MatchRegistryService(logger, emitter, sessions, {
      ...DEFAULT_GAME_CONFIG,
      tickScale: 200,
    });

    inbox = { sA: [], sB: [] };
    for (const id of ['sA', 'sB']) {
      sessions.register(id, {
        connected: true,
        send: (message) => inbox[id].push(message),
      });
    }
  });

  afterEach(() => {
    registry.onModuleDestroy();
    jest.useRealTimers();
  });

  it('creates a match and announces its chat channels', () => {
    const created = jest.fn();
    emitter.on(EVENTS.MATCH_CREATED, created);

    const matchId = registry.createMatch(sideA, sideB);

    const payload: MatchCreatedPayload = {
      matchId,
      channels: ['alphatv', 'beta'],
    };
    expect(created).toHaveBeenCalledWith(payload);
    expect(registry.size()).toBe(1);
    expect(registry.hasPlayer('a')).toBe(true);
    expect(registry.hasSession('sB')).toBe(true);
    expect(registry.matchIdForSession('sA')).toBe(matchId);
  });

  it('rejects a player who already has a live match', () => {
    registry.createMatch(sideA, sideB);

    expect(() =>
      registry.createMatch(sideA, {
        sessionId: 'sC',
        player: { id: 'c', username: 'C', profile_image: '', viewer_count: 0 },
      }),
    ).toThrow(DuplicateParticipantError);
    expect(registry.size()).toBe(1);
  });

  it('rejects pairing a player with themselves', () => {
    expect(() =>
      registry.createMatch(sideA, { ...sideA, sessionId: 'sA2' }),
    ).toThrow(DuplicateParticipantError);
  });

  it('routes readiness by session', () => {
    const matchId = registry.createMatch(sideA, sideB);

    registry.routeReady('sA');
    registry.routeReady('sB');

    expect(registry.get(matchId)?.currentState).toBe(MatchState.IN_PROGRESS);
    expect(inbox.sA).toEqual([{ type: 'game_started', room_id: matchId }]);
  });

  it('fails routing for unknown sessions and matches', () => {
    expect(() => registry.routeReady('nobody')).toThrow(UnknownSessionError);
    expect(() => registry.routeDisconnect('nobody')).toThrow(
      UnknownSessionError,
    );
    expect(() =>
      registry.routePull('missing', MatchSide.PLAYER1, 'v1', 0),
    ).toThrow(UnknownMatchError);
  });

  it('routes chat pulls by channel, case-insensitively', () => {
    const matchId = registry.createMatch(sideA, sideB);
    registry.routeReady('sA');
    registry.routeReady('sB');

    expect(registry.routeChatCommand('AlphaTV', 'v1', Date.now())).toBe(true);
    expect(registry.routeChatCommand('beta', 'v2', Date.now())).toBe(true);
    expect(registry.routeChatCommand('unknown', 'v3', Date.now())).toBe(false);

    const state = registry.get(matchId)?.snapshot();
    expect(state?.player1_score).toBe(1);
    expect(state?.player2_score).toBe(1);
  });

  it('drops the match and every mapping after the final broadcast', () => {
    const ended = jest.fn();
    emitter.on(EVENTS.MATCH_ENDED, ended);
    const matchId = registry.createMatch(sideA, sideB);
    registry.routeReady('sA');
    registry.routeReady('sB');

    registry.routeDisconnect('sB');

    expect(registry.size()).toBe(0);
    expect(registry.get(matchId)).toBeUndefined();
    expect(registry.hasSession('sA')).toBe(false);
    expect(registry.hasPlayer('b')).toBe(false);
    expect(registry.routeChatCommand('alphatv', 'v1', Date.now())).toBe(false);
    expect(inbox.sA.map((m) => m.type)).toEqual([
      'game_started',
      'game_update',
      'game_ended',
    ]);

    expect(ended).toHaveBeenCalledTimes(1);
    const [payload] = ended.mock.calls[0] as [MatchEndedPayload];
    expect(payload.matchId).toBe(matchId);
    expect(payload.channels).toEqual(['alphatv', 'beta']);
    expect(payload.result.reason).toBe(MatchEndReason.OPPONENT_DISCONNECTED);
    expect(payload.result.winner?.id).toBe('a');
  });

  it('lets players start a new match once the previous one ended', () => {
    registry.createMatch(sideA, sideB);
    registry.routeDisconnect('sA');
    registry.routeDisconnect('sB');

    expect(() => registry.createMatch(sideB, sideA)).not.toThrow();
    expect(registry.size()).toBe(1);
  });

  it('feeds one chat into every match listening to it', () => {
    const shared = {
      sessionId: 'sC',
      player: {
        id: 'c',
        username: 'Gamma',
        profile_image: '',
        viewer_count: 5,
        channel_name: 'alphatv',
      },
    };
    const other = {
      sessionId: 'sD',
      player: { id: 'd', username: 'Delta', profile_image: '', viewer_count: 5 },
    };
    for (const id of ['sC', 'sD']) {
      sessions.register(id, { connected: true, send: () => undefined });
    }
    const first = registry.createMatch(sideA, sideB);
    const second = registry.createMatch(other, shared);
    for (const id of ['sA', 'sB', 'sC', 'sD']) registry.routeReady(id);

    registry.routeChatCommand('alphatv', 'v1', Date.now());

    expect(registry.get(first)?.snapshot().player1_score).toBe(1);
    expect(registry.get(second)?.snapshot().player2_score).toBe(1);
  });
});
