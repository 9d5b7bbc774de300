import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';
import { DEFAULT_GAME_CONFIG } from '@/config/game.config';
import { EventsModule } from '@/events/events.module';
import { InboundDispatcher } from '@/events/inbound.dispatcher';
import { OutboundMessage } from '@/events/types/messages.types';
import { ChatIngestionService } from '@/modules/chat/chat-ingestion.service';
import { ChatModule } from '@/modules/chat/chat.module';
import { MatchRegistryService } from '@/modules/match/match-registry.service';
import { MatchmakingService } from '@/modules/matchmaking/services/matchmaking.service';
import { Player } from '@/modules/matchmaking/types/matchmaking.types';
import { SessionRegistryService } from '@/modules/session/session-registry.service';
import { SessionConnection } from '@/modules/session/types/session.types';
import { SharedModule } from '@/shared/shared.module';

class FakeConnection implements SessionConnection {
  connected = true;
  readonly inbox: OutboundMessage[] = [];

  send(message: OutboundMessage) {
    this.inbox.push(message);
  }

  ofType<T extends OutboundMessage['type']>(
    type: T,
  ): Extract<OutboundMessage, { type: T }>[] {
    return this.inbox.filter(
      (m): m is Extract<OutboundMessage, { type: T }> => m.type === type,
    );
  }

  last(): OutboundMessage | undefined {
    return this.inbox[this.inbox.length - 1];
  }
}

const alpha: Player = {
  id: '100',
  username: 'Alpha',
  channel_name: 'alpha_tv',
  profile_image: 'https://example.test/alpha.png',
  viewer_count: 10,
};

const bravo: Player = {
  id: '200',
  username: 'Bravo',
  profile_image: '',
  viewer_count: 10,
};

const flushAsyncListeners = () =>
  new Promise<void>((resolve) => setImmediate(resolve));

describe('game flow (e2e)', () => {
  let moduleRef: TestingModule;
  let dispatcher: InboundDispatcher;
  let sessions: SessionRegistryService;
  let matches: MatchRegistryService;
  let matchmaking: MatchmakingService;
  let chat: ChatIngestionService;
  let one: FakeConnection;
  let two: FakeConnection;

  beforeEach(async () => {
    jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate'] });
    jest.setSystemTime(1_000_000);

    moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => ({ game: DEFAULT_GAME_CONFIG })],
        }),
        EventEmitterModule.forRoot(),
        SharedModule,
        EventsModule,
        ChatModule,
      ],
    }).compile();
    await moduleRef.init();

    dispatcher = moduleRef.get(InboundDispatcher);
    sessions = moduleRef.get(SessionRegistryService);
    matches = moduleRef.get(MatchRegistryService);
    matchmaking = moduleRef.get(MatchmakingService);
    chat = moduleRef.get(ChatIngestionService);

    one = new FakeConnection();
    two = new FakeConnection();
    sessions.register('s1', one);
    sessions.register('s2', two);
  });

  afterEach(async () => {
    await moduleRef.close();
    jest.useRealTimers();
  });

  function pairUp(): string {
    dispatcher.dispatch({ kind: 'join_queue', sessionId: 's1', player: alpha });
    dispatcher.dispatch({ kind: 'join_queue', sessionId: 's2', player: bravo });
    const [found] = one.ofType('match_found');
    return found.room_id;
  }

  function startMatch(): string {
    const roomId = pairUp();
    dispatcher.dispatch({ kind: 'game_ready', sessionId: 's1', roomId });
    dispatcher.dispatch({ kind: 'game_ready', sessionId: 's2', roomId });
    return roomId;
  }

  it('pairs two queued streamers on opposite sides', () => {
    const roomId = pairUp();

    expect(one.inbox).toEqual([
      { type: 'queue_joined' },
      {
        type: 'match_found',
        room_id: roomId,
        side: 'player1',
        opponent: {
          id: '200',
          username: 'Bravo',
          channel_name: 'bravo',
          profile_image: '',
          viewer_count: 10,
        },
      },
    ]);
    expect(two.inbox).toEqual([
      { type: 'queue_joined' },
      {
        type: 'match_found',
        room_id: roomId,
        side: 'player2',
        opponent: {
          id: '100',
          username: 'Alpha',
          channel_name: 'alpha_tv',
          profile_image: 'https://example.test/alpha.png',
          viewer_count: 10,
        },
      },
    ]);
    expect(matchmaking.size()).toBe(0);
    expect(chat.joinedChannels().sort()).toEqual(['alpha_tv', 'bravo']);
  });

  it('moves the rope toward the side whose chat pulls', () => {
    const roomId = startMatch();
    expect(one.last()).toEqual({ type: 'game_started', room_id: roomId });

    for (const viewer of ['v1', 'v2', 'v3', 'v4', 'v5']) {
      expect(
        chat.handleMessage('#Alpha_TV', { 'user-id': viewer }, '!pull', false),
      ).toBe(true);
    }
    jest.advanceTimersByTime(1_000);

    const [update] = two.ofType('game_update');
    expect(update.state).toMatchObject({
      room_id: roomId,
      player1_score: 5,
      player2_score: 0,
      player1_engagement: 0.5,
      player2_engagement: 0,
      time_remaining: 119,
      status: 'active',
    });
    expect(update.state.rope_position).toBeCloseTo(5 * Math.log(6), 9);
  });

  it('ignores pulls sent before the match starts', () => {
    pairUp();
    chat.handleMessage('#bravo', { 'user-id': 'early' }, '!pull', false);
    dispatcher.dispatch({ kind: 'game_ready', sessionId: 's1' });
    dispatcher.dispatch({ kind: 'game_ready', sessionId: 's2' });

    jest.advanceTimersByTime(1_000);

    const [update] = one.ofType('game_update');
    expect(update.state.player2_score).toBe(0);
    expect(update.state.rope_position).toBe(0);
  });

  it('ends in a draw when time runs out with the rope centred', () => {
    const roomId = startMatch();

    jest.advanceTimersByTime(DEFAULT_GAME_CONFIG.durationMs);

    const [ended] = one.ofType('game_ended');
    expect(ended.winner).toBeNull();
    expect(ended.stats).toMatchObject({
      room_id: roomId,
      reason: 'time_expired',
      rope_position: 0,
      duration_ms: 120_000,
    });
    expect(two.last()).toEqual(ended);
    expect(one.ofType('game_update')).toHaveLength(120);
    expect(matches.size()).toBe(0);
    expect(chat.joinedChannels()).toEqual([]);
  });

  it('starts after the grace period when only one side acknowledged', () => {
    const roomId = pairUp();
    dispatcher.dispatch({ kind: 'game_ready', sessionId: 's1', roomId });

    jest.advanceTimersByTime(DEFAULT_GAME_CONFIG.readyGracePeriodMs - 1);
    expect(one.ofType('game_started')).toEqual([]);

    jest.advanceTimersByTime(1);
    expect(two.last()).toEqual({ type: 'game_started', room_id: roomId });
  });

  it('settles a match whose streamer dropped before the start, even after a reconnect', () => {
    const roomId = pairUp();
    dispatcher.dispatch({ kind: 'disconnect', sessionId: 's2' });

    const back = new FakeConnection();
    sessions.register('s2', back);
    dispatcher.dispatch({ kind: 'game_ready', sessionId: 's2', roomId });
    dispatcher.dispatch({ kind: 'game_ready', sessionId: 's1', roomId });
    jest.advanceTimersByTime(3_000);

    expect(one.ofType('game_started')).toEqual([]);
    expect(back.inbox).toEqual([]);

    jest.advanceTimersByTime(DEFAULT_GAME_CONFIG.readyGracePeriodMs - 3_000);

    const [ended] = one.ofType('game_ended');
    expect(ended.winner).toBe('100');
    expect(ended.stats.reason).toBe('opponent_disconnected');
    expect(matches.size()).toBe(0);

    dispatcher.dispatch({ kind: 'join_queue', sessionId: 's2', player: bravo });
    expect(back.inbox).toEqual([{ type: 'queue_joined' }]);
  });

  it('awards the match to the remaining streamer on disconnect', () => {
    startMatch();

    dispatcher.dispatch({ kind: 'disconnect', sessionId: 's2' });

    const [ended] = one.ofType('game_ended');
    expect(ended.winner).toBe('100');
    expect(ended.stats.reason).toBe('opponent_disconnected');
    expect(two.ofType('game_ended')).toEqual([]);
    expect(sessions.has('s2')).toBe(false);
    expect(matches.size()).toBe(0);

    dispatcher.dispatch({ kind: 'join_queue', sessionId: 's1', player: alpha });
    expect(one.last()).toEqual({ type: 'queue_joined' });
  });

  it('forfeits a streamer whose connection stops accepting messages', async () => {
    startMatch();
    two.connected = false;

    jest.advanceTimersByTime(1_000);
    await flushAsyncListeners();
    await flushAsyncListeners();

    const [ended] = one.ofType('game_ended');
    expect(ended.winner).toBe('100');
    expect(ended.stats.reason).toBe('opponent_disconnected');
    expect(matches.size()).toBe(0);
  });

  it('drops a ready ack that names another room', () => {
    pairUp();

    dispatcher.dispatch({
      kind: 'game_ready',
      sessionId: 's1',
      roomId: 'not-this-room',
    });
    dispatcher.dispatch({ kind: 'game_ready', sessionId: 's2' });

    expect(one.ofType('game_started')).toEqual([]);
  });
});
