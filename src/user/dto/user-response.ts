import { User } from '../../core/database/schema';

/**
 * API 응답으로 노출되는 사용자 정보 (비밀번호 제외)
 */
export interface UserResponse {
  id: number;
  code: string;
  name: string;
  email: string;
  phone: string | null;
  date_of_birth: string | null;
  gender: User['gender'];
  avatar: string | null;
  email_verified_at: string | null;
  enable: boolean;
  locked_at: string | null;
  lock_count: number;
  created_at: string;
  updated_at: string;
  deleted_at: string | null;
}

function toIso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

/**
 * 사용자 엔티티를 snake_case 응답 형식으로 변환합니다
 */
export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    code: user.code,
    name: user.name,
    email: user.email,
    phone: user.phone,
    date_of_birth: user.dateOfBirth,
    gender: user.gender,
    avatar: user.avatar,
    email_verified_at: toIso(user.emailVerifiedAt),
    enable: user.enable,
    locked_at: toIso(user.lockedAt),
    lock_count: user.lockCount,
    created_at: user.createdAt.toISOString(),
    updated_at: user.updatedAt.toISOString(),
    deleted_at: toIso(user.deletedAt),
  };
}
