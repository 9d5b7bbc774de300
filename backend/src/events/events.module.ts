import { Module } from '@nestjs/common';
import { MatchModule } from '@/modules/match/match.module';
import { MatchmakingModule } from '@/modules/matchmaking/matchmaking.module';
import { SessionModule } from '@/modules/session/session.module';
import { EventsGateway } from './events.gateway';
import { InboundDispatcher } from './inbound.dispatcher';

@Module({
  imports: [SessionModule, MatchModule, MatchmakingModule],
  providers: [InboundDispatcher, EventsGateway],
  exports: [InboundDispatcher],
})
export class EventsModule {}
