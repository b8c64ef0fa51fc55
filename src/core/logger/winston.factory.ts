/**
 * Winston 로거 팩토리
 *
 * 모든 LoggerService 인스턴스가 공유하는 단일 Winston 로거를 생성합니다.
 * 콘솔 출력 없이 채널별 파일 트랜스포트와 에러 트랜스포트만 사용합니다.
 *
 * @module core/logger
 */

import * as winston from 'winston';
import { LOG_CHANNELS, LOG_SERVICE_NAME } from './logger.constants';
import { createChannelTransport } from './transports/channel.transport';
import { createErrorTransport } from './transports/error.transport';

/**
 * Winston 로거 생성 옵션
 */
export interface WinstonLoggerOptions {
  level: string;
  dir: string;
  /** true면 트랜스포트 없이 모든 로그를 버립니다 */
  silent: boolean;
}

/**
 * 공유 Winston 로거를 생성합니다
 *
 * @param options - 로그 레벨, 디렉토리, silent 여부
 * @returns Winston Logger 인스턴스
 */
export function createWinstonLogger(options: WinstonLoggerOptions): winston.Logger {
  const jsonFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  );

  const transports = options.silent
    ? []
    : [
        ...LOG_CHANNELS.map((channel) => createChannelTransport(channel, options.dir)),
        createErrorTransport(options.dir),
      ];

  return winston.createLogger({
    level: options.level,
    silent: options.silent,
    format: jsonFormat,
    defaultMeta: { service: LOG_SERVICE_NAME },
    transports,
  });
}
