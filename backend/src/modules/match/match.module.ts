import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_GAME_CONFIG, GameConfig } from '@/config/game.config';
import { SessionModule } from '@/modules/session/session.module';
import { MatchController } from './controllers/match.controller';
import { MatchEvents } from './events/match.events';
import { GAME_CONFIG } from './match.constants';
import { MatchRegistryService } from './match-registry.service';

@Module({
  imports: [SessionModule],
  providers: [
    {
      provide: GAME_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): GameConfig => ({
        ...DEFAULT_GAME_CONFIG,
        ...configService.get<GameConfig>('game'),
      }),
    },
    MatchRegistryService,
    MatchEvents,
  ],
  controllers: [MatchController],
  exports: [MatchRegistryService, GAME_CONFIG],
})
export class MatchModule {}
