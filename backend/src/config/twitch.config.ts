import { registerAs } from '@nestjs/config';

export interface TwitchConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  authBaseUrl: string;
  apiBaseUrl: string;
  /** OAuth state token lifetime (seconds) */
  stateTtlSeconds: number;
  chatEnabled: boolean;
  pullCommand: string;
  /** Minimum gap between two counted pulls from one viewer (ms) */
  pullCooldownMs: number;
}

export const twitchConfig = registerAs(
  'twitch',
  (): TwitchConfig => ({
    clientId: process.env.TWITCH_CLIENT_ID || '',
    clientSecret: process.env.TWITCH_CLIENT_SECRET || '',
    redirectUri:
      process.env.TWITCH_REDIRECT_URI || 'http://localhost:3000/auth/callback',
    authBaseUrl: process.env.TWITCH_AUTH_BASE_URL || 'https://id.twitch.tv',
    apiBaseUrl: process.env.TWITCH_API_BASE_URL || 'https://api.twitch.tv',
    stateTtlSeconds: parseInt(process.env.TWITCH_STATE_TTL_SECONDS || '600', 10),
    chatEnabled: process.env.TWITCH_CHAT_ENABLED === 'true',
    pullCommand: (process.env.TWITCH_PULL_COMMAND || '!pull').toLowerCase(),
    pullCooldownMs: parseInt(process.env.TWITCH_PULL_COOLDOWN_MS || '500', 10),
  }),
);
