/**
 * 민감 정보 마스킹 유틸리티
 *
 * 로그에 기록되기 전 요청 헤더, 쿼리, 본문, SQL 파라미터에서
 * 비밀번호/토큰 등의 민감한 값을 마스킹합니다.
 *
 * - 객체/배열(클래스 인스턴스 포함): 키 이름(소문자 비교)이 민감 키 목록에 있으면 값의 타입과 무관하게 마스킹
 * - 문자열: `key=value`, `key: value` 형태의 부분 문자열에서 값만 마스킹
 * - null/undefined/빈 문자열: 그대로 반환
 *
 * 같은 입력에 두 번 적용해도 결과가 달라지지 않으며, 예외를 던지지 않습니다.
 *
 * @example
 * ```typescript
 * redact({ email: 'a@x.com', password: 'secret1' });
 * // { email: 'a@x.com', password: '***REDACTED***' }
 *
 * redact('authorization: Bearer abc.def token=xyz');
 * // 'authorization: ***REDACTED*** token=***REDACTED***'
 * ```
 *
 * @module common/security
 */

/** 마스킹 문자열 */
export const REDACTION_MASK = '***REDACTED***';

/** 기본 민감 키 목록 (소문자) */
export const DEFAULT_SENSITIVE_KEYS: readonly string[] = [
  'password',
  'password_confirmation',
  'current_password',
  'pwd',
  'token',
  'secret',
  'api_key',
  'apikey',
  'x-api-key',
  'credit_card',
  'cvv',
  'pin',
  'authorization',
  'access_token',
  'refresh_token',
  'client_secret',
  'private_key',
  'signature',
];

/** 순환 참조 위치에 들어가는 표시 문자열 */
const CIRCULAR_MARKER = '[Circular]';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * 키 단위로 순회할 객체인지 판단합니다
 *
 * 클래스 인스턴스(DTO 등)도 자체 열거 가능 키를 순회하며, Date와 바이너리 버퍼는 값으로 취급합니다.
 */
function isWalkableObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !(value instanceof Date) &&
    !ArrayBuffer.isView(value) &&
    !(value instanceof ArrayBuffer)
  );
}

/**
 * 문자열 안의 `key[:=]value` 패턴을 마스킹합니다
 *
 * 값 앞의 Bearer/Basic 스킴과 이미 마스킹된 값은 키와 함께 마스크 하나로 정리됩니다.
 */
function redactString(text: string, keys: readonly string[], mask: string): string {
  if (keys.length === 0) {
    return text;
  }

  const alternatives = keys.map(escapeRegExp).join('|');
  const pattern = new RegExp(
    `(^|[^\\w-])(${alternatives})(["']?\\s*[:=]\\s*["']?)(?:(?:bearer|basic)\\s+)?[^\\s,;&"']+`,
    'gi',
  );

  return text.replace(
    pattern,
    (_match, lead: string, key: string, separator: string) => `${lead}${key}${separator}${mask}`,
  );
}

function redactValue(
  value: unknown,
  keys: ReadonlySet<string>,
  keyList: readonly string[],
  mask: string,
  seen: WeakSet<object>,
): unknown {
  if (typeof value === 'string') {
    return value === '' ? value : redactString(value, keyList, mask);
  }

  if (Array.isArray(value)) {
    if (seen.has(value)) {
      return CIRCULAR_MARKER;
    }
    seen.add(value);
    const result = value.map((item) => redactValue(item, keys, keyList, mask, seen));
    seen.delete(value);
    return result;
  }

  if (isWalkableObject(value)) {
    if (seen.has(value)) {
      return CIRCULAR_MARKER;
    }
    seen.add(value);
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = keys.has(key.toLowerCase())
        ? mask
        : redactValue(entry, keys, keyList, mask, seen);
    }
    seen.delete(value);
    return result;
  }

  return value;
}

/**
 * 값에서 민감 정보를 마스킹한 사본을 반환합니다
 *
 * @param value - 마스킹할 값 (문자열, 객체, 배열 등)
 * @param sensitiveKeys - 민감 키 목록 (기본값: DEFAULT_SENSITIVE_KEYS)
 * @param mask - 치환 문자열 (기본값: REDACTION_MASK)
 * @returns 입력과 같은 형태의 마스킹된 값
 */
export function redact(value: string, sensitiveKeys?: readonly string[], mask?: string): string;
export function redact(
  value: Record<string, unknown>,
  sensitiveKeys?: readonly string[],
  mask?: string,
): Record<string, unknown>;
export function redact(value: unknown, sensitiveKeys?: readonly string[], mask?: string): unknown;
export function redact(
  value: unknown,
  sensitiveKeys: readonly string[] = DEFAULT_SENSITIVE_KEYS,
  mask: string = REDACTION_MASK,
): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  const keyList = sensitiveKeys.map((key) => key.toLowerCase());

  try {
    return redactValue(value, new Set(keyList), keyList, mask, new WeakSet());
  } catch {
    return typeof value === 'string' ? mask : {};
  }
}
