/**
 * 설정 모듈 통합 내보내기
 *
 * 모든 설정 파일을 단일 진입점에서 내보냅니다.
 * ConfigModule.forRoot()에서 load 배열에 일괄 등록할 때 사용합니다.
 *
 * @module common/config
 */

export { default as appConfig, isProductionEnv } from './app.config';
export { default as jwtConfig } from './jwt.config';
export { default as redisConfig } from './redis.config';
export { default as databaseConfig } from './database.config';
export { default as loggingConfig } from './logging.config';
