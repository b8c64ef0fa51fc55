/**
 * 로거 모듈
 *
 * Winston 기반 로깅 시스템을 전역으로 제공합니다.
 * logging 설정으로 단일 Winston 인스턴스를 만들고,
 * LoggerService는 주입 대상마다 별도 인스턴스로 생성됩니다.
 */

import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LoggerService } from './logger.service';
import { WINSTON_LOGGER } from './logger.constants';
import { createWinstonLogger } from './winston.factory';

@Global()
@Module({
  providers: [
    {
      provide: WINSTON_LOGGER,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        createWinstonLogger({
          level: configService.get<string>('logging.level', 'info'),
          dir: configService.get<string>('logging.dir', 'logs'),
          silent: configService.get<boolean>('logging.silent', false),
        }),
    },
    LoggerService,
  ],
  exports: [LoggerService],
})
export class LoggerModule {}
