import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  ClassConstructor,
  Transform,
  Type,
  plainToInstance,
} from 'class-transformer';
import {
  Equals,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
  validateSync,
} from 'class-validator';
import { Player } from '@/modules/matchmaking/types/matchmaking.types';

export class PlayerDto {
  @ApiProperty({ type: String, example: '141981764' })
  @IsNotEmpty()
  @IsString()
  id!: string;

  @ApiProperty({ type: String, example: 'StreamerOne' })
  @IsNotEmpty()
  @IsString()
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  username!: string;

  @ApiPropertyOptional({ type: String })
  @IsOptional()
  @IsString()
  profile_image?: string;

  @ApiProperty({ type: Number, minimum: 0, example: 120 })
  @IsInt()
  @Min(0)
  viewer_count!: number;

  @ApiPropertyOptional({
    type: String,
    description: 'Chat channel login. Defaults to the lower-cased username',
  })
  @IsOptional()
  @IsString()
  channel_name?: string;
}

export class JoinQueueMessageDto {
  @Equals('join_queue')
  type!: 'join_queue';

  @IsObject()
  @ValidateNested()
  @Type(() => PlayerDto)
  player!: PlayerDto;
}

export class LeaveQueueMessageDto {
  @Equals('leave_queue')
  type!: 'leave_queue';
}

export class GameReadyMessageDto {
  @Equals('game_ready')
  type!: 'game_ready';

  @IsOptional()
  @IsString()
  room_id?: string;
}

export type ClientMessage =
  | JoinQueueMessageDto
  | LeaveQueueMessageDto
  | GameReadyMessageDto;

function validated<T extends object>(
  cls: ClassConstructor<T>,
  payload: object,
): T | null {
  const instance = plainToInstance(cls, payload);
  const errors = validateSync(instance, { whitelist: true });
  return errors.length === 0 ? instance : null;
}

/**
 * Turns a raw socket payload (object or JSON text) into a validated client
 * message. Returns null for anything malformed or of an unknown type.
 */
export function parseClientMessage(raw: unknown): ClientMessage | null {
  let payload: unknown = raw;

  if (typeof raw === 'string') {
    try {
      payload = JSON.parse(raw);
    } catch {
      return null;
    }
  }

  if (typeof payload !== 'object' || payload === null) return null;
  if (Array.isArray(payload)) return null;

  const type = 'type' in payload ? payload.type : undefined;

  switch (type) {
    case 'join_queue':
      return validated(JoinQueueMessageDto, payload);
    case 'leave_queue':
      return validated(LeaveQueueMessageDto, payload);
    case 'game_ready':
      return validated(GameReadyMessageDto, payload);
    default:
      return null;
  }
}

export function toPlayer(dto: PlayerDto): Player {
  return {
    id: dto.id,
    username: dto.username,
    profile_image: dto.profile_image ?? '',
    viewer_count: dto.viewer_count,
    ...(dto.channel_name ? { channel_name: dto.channel_name } : {}),
  };
}
