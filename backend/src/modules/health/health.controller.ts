import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { SkipThrottle } from '@nestjs/throttler';
import { MatchRegistryService } from '@/modules/match/match-registry.service';
import { MatchmakingService } from '@/modules/matchmaking/services/matchmaking.service';
import { SessionRegistryService } from '@/modules/session/session-registry.service';

@ApiTags('Health')
@Controller('health')
@SkipThrottle()
export class HealthController {
  constructor(
    private readonly matches: MatchRegistryService,
    private readonly sessions: SessionRegistryService,
    private readonly matchmaking: MatchmakingService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Liveness and load counters' })
  check() {
    return {
      status: 'ok' as const,
      matches: this.matches.size(),
      sessions: this.sessions.size(),
      queued: this.matchmaking.size(),
      uptime: Math.floor(process.uptime()),
    };
  }
}
