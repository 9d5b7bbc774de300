import { Controller, Get, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CallbackQueryDto } from './dto/callback-query.dto';
import { ValidateQueryDto } from './dto/validate-query.dto';
import { TwitchAuthService } from './twitch-auth.service';

@ApiTags('Auth')
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: TwitchAuthService) {}

  @Get('login')
  @ApiOperation({
    summary: 'Start the Twitch OAuth flow',
    description: `
Returns the Twitch authorize URL. Send the streamer there; Twitch redirects
back to the configured redirect URI with \`code\` and \`state\`.
    `,
  })
  @ApiResponse({
    status: 200,
    schema: {
      type: 'object',
      properties: {
        auth_url: {
          type: 'string',
          example: 'https://id.twitch.tv/oauth2/authorize?client_id=...',
        },
      },
    },
  })
  login() {
    return this.authService.getLoginUrl();
  }

  @Get('callback')
  @ApiOperation({
    summary: 'Finish the OAuth flow',
    description:
      'Exchanges the code and returns the player profile to send with `join_queue`.',
  })
  @ApiResponse({
    status: 200,
    schema: {
      type: 'object',
      properties: {
        user: {
          type: 'object',
          properties: {
            id: { type: 'string', example: '141981764' },
            username: { type: 'string', example: 'StreamerOne' },
            channel_name: { type: 'string', example: 'streamerone' },
            profile_image: { type: 'string' },
            viewer_count: { type: 'number', example: 120 },
          },
        },
        access_token: { type: 'string' },
      },
    },
  })
  @ApiResponse({
    status: 400,
    description: 'Unknown state token or Twitch rejected the exchange',
  })
  callback(@Query() query: CallbackQueryDto) {
    return this.authService.handleCallback(query.code, query.state);
  }

  @Get('validate')
  @ApiOperation({ summary: 'Check a Twitch access token' })
  @ApiResponse({ status: 401, description: 'Invalid access token' })
  validate(@Query() query: ValidateQueryDto) {
    return this.authService.validate(query.access_token);
  }
}
