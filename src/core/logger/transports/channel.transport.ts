/**
 * 채널별 Winston DailyRotateFile 트랜스포트
 *
 * `channel` 메타데이터가 일치하는 로그만 해당 채널 파일로 저장합니다.
 * 채널이 지정되지 않은 로그는 application 채널로 취급합니다.
 * - 경로: {dir}/{channel}/{channel}-%DATE%.log
 * - 최대 파일 크기: 50MB
 * - 보관 기간: 30일
 */

import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { LogChannel } from '../logger.constants';

/**
 * 지정한 채널의 로그만 통과시키는 포맷을 생성합니다
 *
 * @param channel - 통과시킬 채널
 */
export function channelFilter(channel: LogChannel) {
  return winston.format((info) => {
    const target = info.channel ?? 'application';
    return target === channel ? info : false;
  })();
}

/**
 * 채널 로그 트랜스포트를 생성합니다
 *
 * @param channel - 로그 채널
 * @param dir - 로그 루트 디렉토리
 * @returns DailyRotateFile 트랜스포트 인스턴스
 */
export function createChannelTransport(channel: LogChannel, dir: string): DailyRotateFile {
  return new DailyRotateFile({
    dirname: `${dir}/${channel}`,
    filename: `${channel}-%DATE%.log`,
    datePattern: 'YYYY-MM-DD',
    maxSize: '50m',
    maxFiles: '30d',
    zippedArchive: true,
    format: channelFilter(channel),
  });
}
