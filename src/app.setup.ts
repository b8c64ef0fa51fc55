/**
 * 애플리케이션 전역 설정
 *
 * main.ts와 e2e 테스트가 같은 설정으로 앱을 구성하도록 공유합니다.
 *
 * @module app
 */

import { INestApplication } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import helmet from 'helmet';
import { createValidationPipe } from './common/pipes/validation.pipe';

/**
 * Helmet, CORS, 전역 ValidationPipe, API 프리픽스를 적용합니다
 */
export function configureApp(app: INestApplication): INestApplication {
  const configService = app.get(ConfigService);
  const corsOrigins = configService.get<string>('app.corsOrigins', '*');

  app.use(helmet());

  app.enableCors({
    origin: corsOrigins === '*' ? true : corsOrigins.split(','),
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    exposedHeaders: ['X-Correlation-ID', 'Location', 'Retry-After', 'Content-Range'],
    credentials: true,
  });

  app.useGlobalPipes(createValidationPipe());
  app.setGlobalPrefix(configService.get<string>('app.apiPrefix', 'api'));

  return app;
}
