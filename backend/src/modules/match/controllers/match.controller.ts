import { Controller, Get, Param } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { UnknownMatchError } from '@/common/errors/game.errors';
import { GameStateMessage } from '@/events/types/messages.types';
import { MatchRegistryService } from '../match-registry.service';
import { MatchSummary } from '../types/match.types';

@ApiTags('Matches')
@Controller('matches')
export class MatchController {
  constructor(private readonly registry: MatchRegistryService) {}

  @Get()
  @ApiOperation({ summary: 'List live matches' })
  list(): MatchSummary[] {
    return this.registry.list().map((engine) => engine.summary());
  }

  @Get(':id')
  @ApiOperation({
    summary: 'Current state of one match',
    description: 'Same shape as the `state` of a `game_update` message.',
  })
  @ApiResponse({ status: 404, description: 'No live match with this id' })
  get(@Param('id') id: string): GameStateMessage {
    const engine = this.registry.get(id);
    if (!engine) throw new UnknownMatchError(id);
    return engine.snapshot();
  }
}
