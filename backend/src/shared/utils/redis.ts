import { Redis } from 'ioredis';
import { ConfigService } from '@nestjs/config';
import { LoggerService } from '../logger/logger.service';

/**
 * Builds the optional Redis client behind CacheService.
 * Returns null when neither REDIS_URL nor REDIS_HOST is set; callers then
 * fall back to the in-process store.
 */
export function createRedisClient(
  configService: ConfigService,
  logger: LoggerService,
): Redis | null {
  const url = configService.get<string>('REDIS_URL');
  const host = configService.get<string>('REDIS_HOST');
  if (!url && !host) return null;

  const client = url
    ? new Redis(url, { lazyConnect: true })
    : new Redis({
        host,
        port: Number(configService.get('REDIS_PORT') ?? 6379),
        password: configService.get<string>('REDIS_PASSWORD') || undefined,
        db: Number(configService.get('REDIS_DB') ?? 0),
        lazyConnect: true,
      });

  client.on('error', (error: unknown) => {
    logger.error('Redis client error', error, 'Redis');
  });

  return client;
}
