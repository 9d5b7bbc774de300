import {
  BadRequestException,
  HttpException,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomBytes } from 'crypto';
import { TwitchConfig, twitchConfig } from '@/config/twitch.config';
import { CacheService } from '@/shared/cache/cache.service';
import { LoggerService } from '@/shared/logger/logger.service';
import {
  LoginResult,
  TwitchListResponse,
  TwitchStream,
  TwitchTokenResponse,
  TwitchUser,
  TwitchValidateResponse,
  ValidateResult,
} from './auth.interface';

const STATE_KEY_PREFIX = 'twitch:oauth-state:';
export const TWITCH_SCOPES = 'user:read:email channel:read:subscriptions chat:read';

/**
 * Twitch OAuth authorization-code flow. Resolves a streamer into the Player
 * the game works with; it does not guard any route.
 */
@Injectable()
export class TwitchAuthService {
  private readonly config: TwitchConfig;

  constructor(
    private readonly cache: CacheService,
    private readonly logger: LoggerService,
    configService: ConfigService,
  ) {
    this.config = configService.get<TwitchConfig>('twitch') ?? twitchConfig();
  }

  /**
   * Builds the authorize URL, remembering a one-time state token.
   */
  async getLoginUrl(): Promise<{ auth_url: string }> {
    const state = randomBytes(32).toString('base64url');
    await this.cache.set(
      STATE_KEY_PREFIX + state,
      true,
      this.config.stateTtlSeconds,
    );

    const params = new URLSearchParams({
      client_id: this.config.clientId,
      redirect_uri: this.config.redirectUri,
      response_type: 'code',
      scope: TWITCH_SCOPES,
      state,
    });

    return {
      auth_url: `${this.config.authBaseUrl}/oauth2/authorize?${params.toString()}`,
    };
  }

  /**
   * Consumes the state token, exchanges the code and reads the streamer's
   * profile and current viewer count (0 when offline).
   */
  async handleCallback(code: string, state: string): Promise<LoginResult> {
    const known = await this.cache.take<boolean>(STATE_KEY_PREFIX + state);
    if (!known) throw new BadRequestException('Invalid state token');

    const tokenResponse = await this.request(
      `${this.config.authBaseUrl}/oauth2/token`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({
          client_id: this.config.clientId,
          client_secret: this.config.clientSecret,
          code,
          grant_type: 'authorization_code',
          redirect_uri: this.config.redirectUri,
        }).toString(),
      },
      () => new BadRequestException('Failed to get access token'),
    );
    const token = (await tokenResponse.json()) as TwitchTokenResponse;

    const headers = {
      Authorization: `Bearer ${token.access_token}`,
      'Client-Id': this.config.clientId,
    };

    const userResponse = await this.request(
      `${this.config.apiBaseUrl}/helix/users`,
      { headers },
      () => new BadRequestException('Failed to get user info'),
    );
    const users = (await userResponse.json()) as TwitchListResponse<TwitchUser>;
    const user = users.data[0];
    if (!user) throw new BadRequestException('Failed to get user info');

    const viewerCount = await this.fetchViewerCount(user.id, headers);

    this.logger.log(
      `Streamer ${user.login} logged in (${viewerCount} viewers)`,
      TwitchAuthService.name,
    );

    return {
      user: {
        id: user.id,
        username: user.display_name,
        channel_name: user.login,
        profile_image: user.profile_image_url,
        viewer_count: viewerCount,
      },
      access_token: token.access_token,
    };
  }

  async validate(accessToken: string): Promise<ValidateResult> {
    const response = await this.request(
      `${this.config.authBaseUrl}/oauth2/validate`,
      { headers: { Authorization: `OAuth ${accessToken}` } },
      () => new UnauthorizedException('Invalid access token'),
    );

    return {
      valid: true,
      data: (await response.json()) as TwitchValidateResponse,
    };
  }

  private async fetchViewerCount(
    userId: string,
    headers: Record<string, string>,
  ): Promise<number> {
    const url = `${this.config.apiBaseUrl}/helix/streams?user_id=${encodeURIComponent(userId)}`;

    try {
      const response = await fetch(url, { headers });
      if (!response.ok) {
        this.logger.warn(
          `helix/streams failed: ${response.status} ${response.statusText}`,
          TwitchAuthService.name,
        );
        return 0;
      }
      const streams =
        (await response.json()) as TwitchListResponse<TwitchStream>;
      return streams.data[0]?.viewer_count ?? 0;
    } catch (error) {
      this.logger.warn(
        `helix/streams unreachable: ${
          error instanceof Error ? error.message : String(error)
        }`,
        TwitchAuthService.name,
      );
      return 0;
    }
  }

  /** fetch that turns transport errors and non-2xx answers into `onFailure()` */
  private async request(
    url: string,
    init: RequestInit,
    onFailure: () => HttpException,
  ): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (error) {
      this.logger.warn(
        `${url} unreachable: ${
          error instanceof Error ? error.message : String(error)
        }`,
        TwitchAuthService.name,
      );
      throw onFailure();
    }

    if (!response.ok) {
      this.logger.warn(
        `${url} failed: ${response.status} ${response.statusText}`,
        TwitchAuthService.name,
      );
      throw onFailure();
    }
    return response;
  }
}
