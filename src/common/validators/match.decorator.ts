/**
 * 필드 일치 검증 데코레이터
 *
 * 다른 속성과 값이 같은지 검증합니다 (비밀번호 확인 등).
 *
 * @example
 * ```typescript
 * @Match('password', { message: 'The password confirmation does not match.' })
 * password_confirmation!: string;
 * ```
 */

import { registerDecorator, ValidationArguments, ValidationOptions } from 'class-validator';

export function Match(property: string, validationOptions?: ValidationOptions): PropertyDecorator {
  return (target: object, propertyName: string | symbol) => {
    registerDecorator({
      name: 'match',
      target: target.constructor,
      propertyName: String(propertyName),
      constraints: [property],
      options: validationOptions,
      validator: {
        validate(value: unknown, args: ValidationArguments): boolean {
          const [related] = args.constraints;
          return typeof related === 'string' && Reflect.get(args.object, related) === value;
        },
        defaultMessage(args: ValidationArguments): string {
          return `${args.property} must match ${String(args.constraints[0])}`;
        },
      },
    });
  };
}
