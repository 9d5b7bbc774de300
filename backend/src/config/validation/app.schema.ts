import Joi from 'joi';

export const appEnvSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'test', 'production')
    .default('development'),
  PORT: Joi.number().port().default(3002),
  API_PREFIX: Joi.string().default('api'),
  API_VERSION: Joi.string().default('1'),
  CORS_ORIGIN: Joi.string().default('*'),
  LOG_LEVEL: Joi.string()
    .valid('error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly')
    .default('debug'),
  LOG_DIR: Joi.string().default('logs'),

  REDIS_URL: Joi.string().uri().allow('').optional(),
  REDIS_HOST: Joi.string().allow('').optional(),
  REDIS_PORT: Joi.number().integer().min(1).max(65535).default(6379),
  REDIS_PASSWORD: Joi.string().allow('').optional(),
  REDIS_DB: Joi.number().integer().min(0).default(0),

  GAME_DURATION_SECONDS: Joi.number().integer().min(10).default(120),
  GAME_TICK_INTERVAL_MS: Joi.number().integer().min(50).default(1000),
  GAME_READY_GRACE_MS: Joi.number().integer().min(0).default(10000),
  GAME_PULL_WINDOW_MS: Joi.number().integer().min(1000).default(30000),
  GAME_BASE_STRENGTH: Joi.number().positive().default(1),
  GAME_TICK_SCALE: Joi.number().positive().default(10),
  MATCHMAKING_INTERVAL_MS: Joi.number().integer().min(100).default(1000),

  TWITCH_CLIENT_ID: Joi.string().allow('').default(''),
  TWITCH_CLIENT_SECRET: Joi.string().allow('').default(''),
  TWITCH_REDIRECT_URI: Joi.string()
    .uri()
    .default('http://localhost:3000/auth/callback'),
  TWITCH_AUTH_BASE_URL: Joi.string().uri().default('https://id.twitch.tv'),
  TWITCH_API_BASE_URL: Joi.string().uri().default('https://api.twitch.tv'),
  TWITCH_STATE_TTL_SECONDS: Joi.number().integer().min(30).default(600),
  TWITCH_CHAT_ENABLED: Joi.boolean().default(false),
  TWITCH_PULL_COMMAND: Joi.string().default('!pull'),
  TWITCH_PULL_COOLDOWN_MS: Joi.number().integer().min(0).default(500),
}).unknown(true);
