/**
 * 사용자 생성 DTO
 *
 * POST /users 요청 본문입니다. 필드 이름은 snake_case입니다.
 *
 * @example
 * ```typescript
 * const dto: CreateUserDto = {
 *   name: 'Jane Doe',
 *   email: 'jane@example.com',
 *   password: 'test-secret',
 *   password_confirmation: 'test-secret',
 *   gender: 'female',
 * };
 * ```
 *
 * @module user/dto
 */

import {
  IsBoolean,
  IsDateString,
  IsEmail,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  MaxLength,
  MinLength,
} from 'class-validator';
import { USER_GENDERS, UserGender } from '../../core/database/schema';
import { Match } from '../../common/validators/match.decorator';

export class CreateUserDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @IsEmail()
  @MaxLength(255)
  email!: string;

  @IsString()
  @MinLength(8)
  @MaxLength(255)
  password!: string;

  @IsString()
  @Match('password', { message: 'The password confirmation does not match.' })
  password_confirmation!: string;

  @IsOptional()
  @IsString()
  @MaxLength(20)
  phone?: string;

  /** YYYY-MM-DD */
  @IsOptional()
  @IsDateString({ strict: true })
  date_of_birth?: string;

  @IsOptional()
  @IsIn(USER_GENDERS)
  gender?: UserGender;

  @IsOptional()
  @IsUrl()
  @MaxLength(2048)
  avatar?: string;

  /** 생성 시에는 항상 활성 상태이므로 값은 반영되지 않습니다 */
  @IsOptional()
  @IsBoolean()
  enabled?: boolean;
}
