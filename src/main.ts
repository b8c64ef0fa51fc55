/**
 * 애플리케이션 진입점
 *
 * NestJS 애플리케이션을 부트스트랩하고 전역 설정을 적용합니다.
 *
 * @module main
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { LoggerService } from './core/logger/logger.service';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  const logger = await app.resolve(LoggerService);
  logger.setContext('Bootstrap');
  app.useLogger(logger);

  configureApp(app);
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const port = configService.get<number>('app.port', 3000);
  const apiPrefix = configService.get<string>('app.apiPrefix', 'api');
  const nodeEnv = configService.get<string>('app.nodeEnv', 'local');

  await app.listen(port);

  logger.log(`Environment: ${nodeEnv}`);
  logger.log(`Server running on http://localhost:${port}/${apiPrefix}`);
}

void bootstrap();
