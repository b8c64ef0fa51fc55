/**
 * 애플리케이션 로거 서비스
 *
 * Winston 기반의 구조화된 JSON 로깅을 제공합니다.
 * 모든 인스턴스가 하나의 Winston 로거를 공유하며, 주입받는 클래스마다
 * 별도 인스턴스(TRANSIENT)가 생성되어 setContext가 서로 간섭하지 않습니다.
 *
 * 로그는 채널(application/api/database/performance/service-errors)별
 * 파일로 분리 기록됩니다. 채널을 지정하지 않으면 application 채널입니다.
 *
 * @example
 * ```typescript
 * constructor(private readonly logger: LoggerService) {
 *   this.logger.setContext('UserService');
 *   this.logger.info('User created', { userId: 1 });
 *   this.logger.channel('performance').warn('Slow query detected', { duration_ms: 1200 });
 * }
 * ```
 */

import {
  Inject,
  Injectable,
  LoggerService as NestLoggerService,
  Scope,
} from '@nestjs/common';
import * as winston from 'winston';
import { LogChannel, WINSTON_LOGGER } from './logger.constants';

/**
 * 로그 메타데이터 인터페이스
 */
export interface LogMetadata {
  [key: string]: unknown;
}

function isLogMetadata(value: unknown): value is LogMetadata {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 특정 채널에 기록하는 로거
 *
 * LoggerService.channel()로 생성합니다.
 */
export class ChannelLogger {
  constructor(
    private readonly logger: winston.Logger,
    readonly name: LogChannel,
    private readonly context: string,
  ) {}

  info(message: string, meta?: LogMetadata): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: LogMetadata): void {
    this.write('error', message, meta);
  }

  debug(message: string, meta?: LogMetadata): void {
    this.write('debug', message, meta);
  }

  private write(level: string, message: string, meta?: LogMetadata): void {
    this.logger.log(level, message, { context: this.context, ...meta, channel: this.name });
  }
}

@Injectable({ scope: Scope.TRANSIENT })
export class LoggerService implements NestLoggerService {
  private context = 'Application';

  constructor(@Inject(WINSTON_LOGGER) private readonly logger: winston.Logger) {}

  /**
   * 로거 컨텍스트를 설정합니다
   *
   * @param context - 로그에 포함될 컨텍스트 이름 (예: 클래스명)
   */
  setContext(context: string): void {
    this.context = context;
  }

  /**
   * 지정한 채널로 기록하는 로거를 반환합니다
   *
   * @param name - 로그 채널
   */
  channel(name: LogChannel): ChannelLogger {
    return new ChannelLogger(this.logger, name, this.context);
  }

  /**
   * INFO 레벨 로그를 기록합니다 (NestJS LoggerService 호환)
   *
   * @param message - 로그 메시지
   * @param optionalParams - 컨텍스트 문자열, Error 또는 메타데이터
   */
  log(message: string, ...optionalParams: unknown[]): void {
    const meta = this.extractMeta(optionalParams);
    this.logger.info(message, { context: this.context, ...meta });
  }

  /**
   * INFO 레벨 로그를 기록합니다
   *
   * @param message - 로그 메시지
   * @param meta - 추가 메타데이터
   */
  info(message: string, meta?: LogMetadata): void {
    this.logger.info(message, { context: this.context, ...meta });
  }

  /**
   * WARN 레벨 로그를 기록합니다
   *
   * @param message - 경고 메시지
   * @param optionalParams - 추가 메타데이터
   */
  warn(message: string, ...optionalParams: unknown[]): void {
    const meta = this.extractMeta(optionalParams);
    this.logger.warn(message, { context: this.context, ...meta });
  }

  /**
   * ERROR 레벨 로그를 기록합니다
   *
   * @param message - 에러 메시지
   * @param optionalParams - 추가 메타데이터 (에러 객체 포함 가능)
   */
  error(message: string, ...optionalParams: unknown[]): void {
    const meta = this.extractMeta(optionalParams);
    this.logger.error(message, { context: this.context, ...meta });
  }

  debug(message: string, ...optionalParams: unknown[]): void {
    const meta = this.extractMeta(optionalParams);
    this.logger.debug(message, { context: this.context, ...meta });
  }

  verbose(message: string, ...optionalParams: unknown[]): void {
    const meta = this.extractMeta(optionalParams);
    this.logger.verbose(message, { context: this.context, ...meta });
  }

  /**
   * NestJS LoggerService 호환을 위한 메타데이터 추출
   *
   * @param optionalParams - NestJS에서 전달하는 선택적 파라미터
   * @returns 추출된 메타데이터 객체
   */
  private extractMeta(optionalParams: unknown[]): LogMetadata {
    if (optionalParams.length === 0) {
      return {};
    }

    const lastParam = optionalParams[optionalParams.length - 1];

    if (typeof lastParam === 'string') {
      return { context: lastParam };
    }

    if (lastParam instanceof Error) {
      return {
        error: lastParam.message,
        stack: lastParam.stack,
      };
    }

    if (isLogMetadata(lastParam)) {
      return lastParam;
    }

    return { additionalInfo: optionalParams };
  }
}
