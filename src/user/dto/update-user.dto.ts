/**
 * 사용자 수정 DTO
 *
 * PUT /users/:id 요청 본문입니다. 모든 필드가 선택적이며,
 * 비밀번호를 바꿀 때는 password_confirmation이 함께 필요합니다.
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
  ValidateIf,
} from 'class-validator';
import { USER_GENDERS, UserGender } from '../../core/database/schema';
import { Match } from '../../common/validators/match.decorator';

export class UpdateUserDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name?: string;

  @IsOptional()
  @IsEmail()
  @MaxLength(255)
  email?: string;

  @IsOptional()
  @IsString()
  @MinLength(8)
  @MaxLength(255)
  password?: string;

  @ValidateIf((dto: UpdateUserDto) => dto.password !== undefined)
  @IsString()
  @Match('password', { message: 'The password confirmation does not match.' })
  password_confirmation?: string;

  @IsOptional()
  @IsString()
  @MaxLength(20)
  phone?: string;

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

  @IsOptional()
  @IsBoolean()
  enable?: boolean;
}
