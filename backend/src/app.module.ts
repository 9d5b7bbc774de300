import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';

import { appConfig, gameConfig, twitchConfig } from './config';
import { appEnvSchema } from './config/validation/app.schema';
import { SharedModule } from './shared/shared.module';
import { AuthModule } from './modules/auth/auth.module';
import { HealthModule } from './modules/health/health.module';

// Event Emitter
import { EventEmitterModule } from '@nestjs/event-emitter';
import { EventsModule } from './events/events.module';

// Engines modules
import { SessionModule } from './modules/session/session.module';
import { MatchmakingModule } from './modules/matchmaking/matchmaking.module';
import { MatchModule } from './modules/match/match.module';
import { ChatModule } from './modules/chat/chat.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, gameConfig, twitchConfig],
      envFilePath: ['.env', '.env.local'],
      validationSchema: appEnvSchema,
    }),

    // Rate limiting
    ThrottlerModule.forRootAsync({
      useFactory: () => ({
        throttlers: [
          {
            ttl: 60000,
            limit: 100,
          },
        ],
      }),
    }),

    // Event Emitter module
    EventEmitterModule.forRoot(),

    // Core modules
    SharedModule,

    // Websocket Events module
    EventsModule,

    // Engines modules
    SessionModule,
    MatchmakingModule,
    MatchModule,
    ChatModule,

    // Feature modules
    AuthModule,
    HealthModule,
  ],
  providers: [{ provide: APP_GUARD, useClass: ThrottlerGuard }],
})
export class AppModule {}
