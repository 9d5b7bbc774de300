import { BadRequestException, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TwitchConfig } from '@/config/twitch.config';
import { CacheService, KeyvStore } from '@/shared/cache/cache.service';
import { LoggerService } from '@/shared/logger/logger.service';
import { TWITCH_SCOPES, TwitchAuthService } from './twitch-auth.service';

class MapStore implements KeyvStore {
  private readonly map = new Map<string, unknown>();

  async get<T>(key: string): Promise<T | undefined> {
    return this.map.get(key) as T | undefined;
  }
  async set(key: string, value: unknown): Promise<boolean> {
    this.map.set(key, value);
    return true;
  }
  async delete(key: string): Promise<boolean> {
    return this.map.delete(key);
  }
}

const twitch: TwitchConfig = {
  clientId: 'test-client',
  clientSecret: 'test-secret',
  redirectUri: 'http://localhost:3000/auth/callback',
  authBaseUrl: 'https://id.twitch.tv',
  apiBaseUrl: 'https://api.twitch.tv',
  stateTtlSeconds: 600,
  chatEnabled: false,
  pullCommand: '!pull',
  pullCooldownMs: 500,
};

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('TwitchAuthService', () => {
  let cache: CacheService;
  let service: TwitchAuthService;
  let fetchMock: jest.SpyInstance;

  beforeEach(() => {
    cache = new CacheService(new MapStore(), null);
    service = new TwitchAuthService(
      cache,
      new LoggerService(),
      new ConfigService({ twitch }),
    );
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  async function loginState(): Promise<string> {
    const { auth_url } = await service.getLoginUrl();
    const state = new URL(auth_url).searchParams.get('state');
    if (!state) throw new Error('no state in auth url');
    return state;
  }

  it('builds the authorize URL and remembers the state', async () => {
    const { auth_url } = await service.getLoginUrl();
    const url = new URL(auth_url);

    expect(url.origin + url.pathname).toBe(
      'https://id.twitch.tv/oauth2/authorize',
    );
    expect(url.searchParams.get('client_id')).toBe('test-client');
    expect(url.searchParams.get('redirect_uri')).toBe(twitch.redirectUri);
    expect(url.searchParams.get('response_type')).toBe('code');
    expect(url.searchParams.get('scope')).toBe(TWITCH_SCOPES);

    const state = url.searchParams.get('state') ?? '';
    expect(state.length).toBeGreaterThan(20);
    await expect(cache.get(`twitch:oauth-state:${state}`)).resolves.toBe(true);
  });

  it('rejects an unknown state without calling Twitch', async () => {
    await expect(service.handleCallback('code', 'forged')).rejects.toThrow(
      BadRequestException,
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('exchanges the code and resolves the player', async () => {
    const state = await loginState();
    fetchMock
      .mockResolvedValueOnce(json({ access_token: 'test-token' }))
      .mockResolvedValueOnce(
        json({
          data: [
            {
              id: '1001',
              login: 'streamerone',
              display_name: 'StreamerOne',
              profile_image_url: 'https://example.test/avatar.png',
            },
          ],
        }),
      )
      .mockResolvedValueOnce(json({ data: [{ user_id: '1001', viewer_count: 57 }] }));

    const result = await service.handleCallback('the-code', state);

    expect(result).toEqual({
      user: {
        id: '1001',
        username: 'StreamerOne',
        channel_name: 'streamerone',
        profile_image: 'https://example.test/avatar.png',
        viewer_count: 57,
      },
      access_token: 'test-token',
    });

    expect(fetchMock).toHaveBeenCalledTimes(3);
    const [tokenUrl, tokenInit] = fetchMock.mock.calls[0];
    expect(tokenUrl).toBe('https://id.twitch.tv/oauth2/token');
    expect(tokenInit.method).toBe('POST');
    expect(new URLSearchParams(tokenInit.body).get('code')).toBe('the-code');
    expect(fetchMock.mock.calls[2][0]).toBe(
      'https://api.twitch.tv/helix/streams?user_id=1001',
    );
    expect(fetchMock.mock.calls[1][1].headers).toEqual({
      Authorization: 'Bearer test-token',
      'Client-Id': 'test-client',
    });
  });

  it('consumes the state token', async () => {
    const state = await loginState();
    fetchMock.mockResolvedValue(json({}, 400));

    await expect(service.handleCallback('c', state)).rejects.toThrow(
      'Failed to get access token',
    );
    await expect(service.handleCallback('c', state)).rejects.toThrow(
      'Invalid state token',
    );
  });

  it('reports zero viewers for an offline channel', async () => {
    const state = await loginState();
    fetchMock
      .mockResolvedValueOnce(json({ access_token: 'test-token' }))
      .mockResolvedValueOnce(
        json({
          data: [
            {
              id: '2',
              login: 'quiet',
              display_name: 'Quiet',
              profile_image_url: '',
            },
          ],
        }),
      )
      .mockResolvedValueOnce(json({ data: [] }));

    const result = await service.handleCallback('c', state);

    expect(result.user.viewer_count).toBe(0);
  });

  it('fails with 400 when the user lookup fails', async () => {
    const state = await loginState();
    fetchMock
      .mockResolvedValueOnce(json({ access_token: 'test-token' }))
      .mockResolvedValueOnce(json({ message: 'nope' }, 401));

    await expect(service.handleCallback('c', state)).rejects.toThrow(
      'Failed to get user info',
    );
  });

  it('fails with 400 when Twitch is unreachable', async () => {
    const state = await loginState();
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(service.handleCallback('c', state)).rejects.toThrow(
      BadRequestException,
    );
  });

  describe('validate', () => {
    it('returns the token details', async () => {
      const data = {
        client_id: 'test-client',
        login: 'streamerone',
        user_id: '1001',
        scopes: ['chat:read'],
        expires_in: 3600,
      };
      fetchMock.mockResolvedValueOnce(json(data));

      await expect(service.validate('test-token')).resolves.toEqual({
        valid: true,
        data,
      });
      expect(fetchMock.mock.calls[0][1].headers).toEqual({
        Authorization: 'OAuth test-token',
      });
    });

    it('rejects an invalid token with 401', async () => {
      fetchMock.mockResolvedValueOnce(json({ status: 401 }, 401));

      await expect(service.validate('test-token')).rejects.toThrow(
        UnauthorizedException,
      );
    });
  });
});
