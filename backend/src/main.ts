import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, VersioningType } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import helmet from 'helmet';
import compression from 'compression';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { TransformInterceptor } from './common/interceptors/transform.interceptor';
import { LoggerService } from './shared/logger/logger.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  });

  const configService = app.get(ConfigService);
  const logger = app.get(LoggerService);

  // Set up logger
  app.useLogger(logger);
  app.enableShutdownHooks();

  // Security middleware
  app.use(helmet());
  app.use(compression());

  // CORS
  app.enableCors({
    origin: configService.get('app.corsOrigin', '*'),
    credentials: true,
  });

  // Global prefix and versioning
  app.setGlobalPrefix(configService.get('app.apiPrefix', 'api'));
  app.enableVersioning({
    type: VersioningType.URI,
    defaultVersion: configService.get('app.apiVersion', '1'),
  });

  // Global pipes
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  // Global filters and interceptors
  app.useGlobalFilters(new HttpExceptionFilter(logger));
  app.useGlobalInterceptors(new TransformInterceptor());

  // Swagger documentation
  const config = new DocumentBuilder()
    .setTitle('Tug of Chat API')
    .setDescription(
      `## Tug of Chat API

Two streamers are paired and their viewers pull a rope by typing \`!pull\`
in chat. The score is engagement-weighted, so small channels can beat big
ones.

### Flow
1. \`GET /auth/login\`, then follow \`auth_url\` to Twitch
2. \`GET /auth/callback\` returns the player profile
3. Open a socket.io connection (optional \`session_id\` query) and send
   \`{type: "join_queue", player}\` on the \`message\` event
4. On \`match_found\`, reply \`{type: "game_ready"}\`; \`game_update\`
   messages follow every second until \`game_ended\`
      `,
    )
    .setVersion('1.0')
    .addTag('Auth', 'Twitch OAuth')
    .addTag('Matches', 'Live match inspection')
    .addTag('Matchmaking', 'Queue inspection')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document);

  const port = configService.get<number>('app.port', 3002);

  await app.listen(port);

  logger.log(
    `API is running on: http://localhost:${port}/${configService.get('app.apiPrefix', 'api')}`,
    'Bootstrap',
  );
  logger.log(
    `Swagger documentation available at: http://localhost:${port}/docs`,
    'Bootstrap',
  );
}

void bootstrap();
