import { Module } from '@nestjs/common';
import { MatchModule } from '@/modules/match/match.module';
import { MatchmakingModule } from '@/modules/matchmaking/matchmaking.module';
import { SessionModule } from '@/modules/session/session.module';
import { HealthController } from './health.controller';

@Module({
  imports: [MatchModule, MatchmakingModule, SessionModule],
  controllers: [HealthController],
})
export class HealthModule {}
