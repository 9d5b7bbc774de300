import { Module } from '@nestjs/common';
import { GameConfig } from '@/config/game.config';
import { GAME_CONFIG } from '@/modules/match/match.constants';
import { MatchModule } from '@/modules/match/match.module';
import { SessionModule } from '@/modules/session/session.module';
import { MatchmakingController } from './matchmaking.controller';
import { MatchmakingService } from './services/matchmaking.service';
import {
  MATCHMAKING_CONFIG,
  MatchmakingConfig,
} from './types/matchmaking.types';

@Module({
  imports: [MatchModule, SessionModule],
  providers: [
    {
      provide: MATCHMAKING_CONFIG,
      inject: [GAME_CONFIG],
      useFactory: (game: GameConfig): MatchmakingConfig => ({
        intervalMs: game.matchmakingIntervalMs,
      }),
    },
    MatchmakingService,
  ],
  controllers: [MatchmakingController],
  exports: [MatchmakingService],
})
export class MatchmakingModule {}
