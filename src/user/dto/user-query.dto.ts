/**
 * 사용자 조회 쿼리 DTO
 *
 * 쿼리 문자열은 전역 ValidationPipe의 암시적 변환으로 숫자가 됩니다.
 *
 * @module user/dto
 */

import {
  ArrayNotEmpty,
  IsArray,
  IsEmail,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';

export class ListUsersQueryDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  page: number = 1;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  per_page: number = 15;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  search?: string;
}

export class SearchUsersQueryDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  q!: string;
}

export class LockUserQueryDto {
  /** 잠금 시간 (초) */
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(31536000)
  seconds: number = 3600;
}

/** 범위 조회 한 번에 반환할 수 있는 최대 사용자 수 */
export const USER_RANGE_MAX_SPAN = 100;

export class UserRangeQueryDto {
  @IsInt()
  @Min(1)
  from!: number;

  @IsInt()
  @Min(1)
  to!: number;
}

export class CheckEmailQueryDto {
  @IsEmail()
  email!: string;
}

export class BulkDeleteDto {
  @IsArray()
  @ArrayNotEmpty()
  @IsInt({ each: true })
  ids!: number[];
}
