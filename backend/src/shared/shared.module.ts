import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Keyv from 'keyv';
import { CacheableMemory } from 'cacheable';
import type { Redis } from 'ioredis';
import { LoggerService } from './logger/logger.service';
import { CacheService, MEMORY_STORE, REDIS_STORE } from './cache/cache.service';
import { createRedisClient } from './utils/redis';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    LoggerService,
    {
      provide: MEMORY_STORE,
      useFactory: () =>
        new Keyv({ store: new CacheableMemory({ ttl: 60_000, lruSize: 5_000 }) }),
    },
    {
      provide: REDIS_STORE,
      inject: [ConfigService, LoggerService],
      useFactory: (
        configService: ConfigService,
        logger: LoggerService,
      ): Redis | null => createRedisClient(configService, logger),
    },
    CacheService,
  ],
  exports: [LoggerService, CacheService],
})
export class SharedModule {}
