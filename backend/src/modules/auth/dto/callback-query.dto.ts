import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class CallbackQueryDto {
  @ApiProperty({ type: String, description: 'Authorization code from Twitch' })
  @IsNotEmpty()
  @IsString()
  code!: string;

  @ApiProperty({
    type: String,
    description: 'State token returned by GET /auth/login',
  })
  @IsNotEmpty()
  @IsString()
  state!: string;
}
