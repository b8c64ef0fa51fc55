import { Response } from 'express';
import { ApiResult } from '../interfaces/api-response.interface';

/**
 * 응답 빌더 결과를 Express 응답에 적용합니다
 *
 * body가 null이면(204) 본문 없이 종료합니다.
 */
export function writeApiResult(res: Response, result: ApiResult): void {
  res.set(result.headers);
  res.status(result.statusCode);

  if (result.body === null) {
    res.end();
    return;
  }

  res.json(result.body);
}
