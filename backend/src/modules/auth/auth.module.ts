import { Module } from '@nestjs/common';
import { AuthController } from './auth.controller';
import { TwitchAuthService } from './twitch-auth.service';

@Module({
  controllers: [AuthController],
  providers: [TwitchAuthService],
  exports: [TwitchAuthService],
})
export class AuthModule {}
