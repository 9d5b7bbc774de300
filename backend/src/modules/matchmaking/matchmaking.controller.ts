import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { MatchmakingService } from './services/matchmaking.service';

@ApiTags('Matchmaking')
@Controller('matchmaking')
export class MatchmakingController {
  constructor(private readonly matchmaking: MatchmakingService) {}

  @Get('queue')
  @ApiOperation({ summary: 'Players currently waiting, oldest first' })
  queue() {
    const entries = this.matchmaking.getQueue();
    return {
      size: entries.length,
      entries: entries.map((e) => ({
        player_id: e.player.id,
        username: e.player.username,
        joined_at: new Date(e.joinedAt).toISOString(),
      })),
    };
  }
}
