/**
 * 로깅 설정
 *
 * Winston 로거의 레벨, 로그 파일 디렉토리, 출력 억제 여부를 정의합니다.
 *
 * @module common/config
 */

import { registerAs } from '@nestjs/config';
import { parseBoolean } from '../utils';

/**
 * 로깅 설정을 등록합니다.
 *
 * @description
 * - level: 최소 로그 레벨 (error, warn, info, debug, verbose)
 * - dir: 채널별 로그 파일이 생성될 루트 디렉토리
 * - silent: true면 어떤 트랜스포트에도 기록하지 않음 (테스트 환경)
 */
export default registerAs('logging', () => ({
  level: process.env.LOG_LEVEL || 'info',
  dir: process.env.LOG_DIR || 'logs',
  silent: parseBoolean(process.env.LOG_SILENT, false),
}));
