/**
 * 비밀번호 해시 서비스
 *
 * argon2id로 비밀번호를 해시하고 검증합니다.
 *
 * @module core/security
 */

import { Injectable } from '@nestjs/common';
import argon2 from 'argon2';

@Injectable()
export class PasswordService {
  /**
   * 평문 비밀번호를 argon2id로 해시합니다
   */
  hash(plain: string): Promise<string> {
    return argon2.hash(plain, { type: argon2.argon2id });
  }

  /**
   * 평문 비밀번호가 해시와 일치하는지 확인합니다
   *
   * 해시 형식이 잘못된 경우 false를 반환합니다.
   */
  async verify(hash: string, plain: string): Promise<boolean> {
    try {
      return await argon2.verify(hash, plain);
    } catch {
      return false;
    }
  }
}
