import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventsModule } from '@/events/events.module';
import { LoggerService } from '@/shared/logger/logger.service';
import { CHAT_CLIENT } from './chat.constants';
import { ChatIngestionService } from './chat-ingestion.service';
import { TmiChatClient } from './tmi-chat.client';
import { ChatClient } from './types/chat.types';

@Module({
  imports: [EventsModule],
  providers: [
    {
      provide: CHAT_CLIENT,
      inject: [ConfigService, LoggerService],
      useFactory: (
        configService: ConfigService,
        logger: LoggerService,
      ): ChatClient | null =>
        configService.get<boolean>('twitch.chatEnabled')
          ? new TmiChatClient(logger)
          : null,
    },
    ChatIngestionService,
  ],
  exports: [ChatIngestionService],
})
export class ChatModule {}
