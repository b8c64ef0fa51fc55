/**
 * 사용자 컨트롤러
 *
 * 사용자 관리 REST API 엔드포인트를 제공합니다.
 * 비즈니스 로직은 UserService에 위임하고, 모든 응답은 ResponseBuilder envelope로 작성합니다.
 *
 * @example
 * ```
 * GET    /api/user                  - 현재 요청 주체
 * GET    /api/users                 - 목록 (페이지네이션)
 * GET    /api/users/search?q=       - 검색
 * GET    /api/users/stats           - 통계 (5분 캐시)
 * POST   /api/users                 - 생성
 * GET    /api/users/:code           - 코드로 조회
 * PUT    /api/users/:id             - 수정
 * DELETE /api/users/:id             - Soft Delete
 * DELETE /api/users/:id/force       - 영구 삭제
 * POST   /api/users/:id/restore     - 복원
 * POST   /api/users/:id/lock        - 잠금 (?seconds=)
 * POST   /api/users/bulk-delete     - 일괄 삭제
 * ```
 *
 * @module user
 */

import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
  Req,
  Res,
  UseGuards,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request, Response } from 'express';
import { UserService } from './user.service';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import {
  BulkDeleteDto,
  CheckEmailQueryDto,
  ListUsersQueryDto,
  LockUserQueryDto,
  SearchUsersQueryDto,
  USER_RANGE_MAX_SPAN,
  UserRangeQueryDto,
} from './dto/user-query.dto';
import { toUserResponse } from './dto/user-response';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { ActiveUserGuard } from '../common/guards/active-user.guard';
import { ApiResult } from '../common/interfaces/api-response.interface';
import { ResponseBuilder, BulkItemResult } from '../common/response/response-builder';
import { ResponseBuilderFactory } from '../common/response/response-builder.factory';
import { writeApiResult } from '../common/response/write-api-result';
import { CACHE_TTL } from '../core/cache/cache-key.constants';
import { RequestActor, RequestContextService } from '../core/context/request-context.service';
import { User } from '../core/database/schema';
import { errorMessage } from '../common/utils';

@Controller()
export class UserController {
  private readonly apiPrefix: string;

  constructor(
    private readonly userService: UserService,
    private readonly responses: ResponseBuilderFactory,
    private readonly requestContext: RequestContextService,
    configService: ConfigService,
  ) {
    this.apiPrefix = configService.get<string>('app.apiPrefix', 'api');
  }

  /**
   * 현재 요청 주체의 사용자 정보를 조회합니다
   *
   * 익명 요청이면 data는 null입니다. 비활성/잠금 계정은 ActiveUserGuard가 403으로 막습니다.
   */
  @Get('user')
  @UseGuards(ActiveUserGuard)
  async current(@CurrentUser() actor: RequestActor | null, @Res() res: Response): Promise<void> {
    const user = actor ? await this.userService.getById(actor.id) : null;
    writeApiResult(res, this.builder().successResponse(user ? toUserResponse(user) : null));
  }

  /**
   * 활성 사용자 목록을 조회합니다
   *
   * @example
   * GET /api/users?page=2&per_page=15&search=kim
   *
   * Response:
   * {
   *   "success": true,
   *   "message": "Users retrieved successfully",
   *   "code": 200,
   *   "data": { "items": [...], "pagination": { "current_page": 2, ... } },
   *   "links": { "self": "/api/users?per_page=15&search=kim&page=2", ... }
   * }
   */
  @Get('users')
  async list(@Query() query: ListUsersQueryDto, @Req() req: Request, @Res() res: Response): Promise<void> {
    const page = await this.userService.list(query.page, query.per_page, query.search);
    const result = this.builder().paginatedResponse(
      page
        .map(toUserResponse)
        .withPath(req.originalUrl.split('?')[0])
        .appends({ per_page: String(query.per_page), search: query.search }),
      'Users retrieved successfully',
    );
    writeApiResult(res, result);
  }

  @Get('users/search')
  async search(@Query() query: SearchUsersQueryDto, @Res() res: Response): Promise<void> {
    const page = await this.userService.search(query.q);
    writeApiResult(
      res,
      this.builder().collectionResponse(page.items.map(toUserResponse), 'Search results retrieved successfully'),
    );
  }

  @Get('users/stats')
  async statistics(@Res() res: Response): Promise<void> {
    const { statistics, cached, generatedAt } = await this.userService.cachedStatistics();
    const result = this.builder()
      .withMeta({ generated_at: generatedAt, cached, cache_ttl: CACHE_TTL.USER_STATS })
      .successResponse(statistics, 'User statistics retrieved successfully');
    writeApiResult(res, result);
  }

  /**
   * 이메일 사용 가능 여부를 확인합니다 (사용 중이면 409)
   */
  @Get('users/check-email')
  async checkEmail(@Query() query: CheckEmailQueryDto, @Res() res: Response): Promise<void> {
    const owner = await this.userService.getByEmail(query.email);
    const result = owner
      ? this.builder().conflictResponse('Email already taken', {
          email: ['The email has already been taken.'],
        })
      : this.builder().successResponse({ available: true }, 'Email is available');
    writeApiResult(res, result);
  }

  /**
   * 생성일 역순 기준 from..to 번째 사용자를 조회합니다 (206 Partial Content)
   */
  @Get('users/range')
  async range(@Query() query: UserRangeQueryDto, @Res() res: Response): Promise<void> {
    if (query.to < query.from) {
      writeApiResult(
        res,
        this.builder().validationErrorResponse({
          to: ['The to field must be greater than or equal to from.'],
        }),
      );
      return;
    }

    if (query.to - query.from + 1 > USER_RANGE_MAX_SPAN) {
      writeApiResult(
        res,
        this.builder().validationErrorResponse({
          to: [`The range may not span more than ${USER_RANGE_MAX_SPAN} users.`],
        }),
      );
      return;
    }

    const { items, total } = await this.userService.range(query.from, query.to);
    const result =
      items.length === 0
        ? this.builder().notFoundResponse('No users in the requested range')
        : this.builder().partialContentResponse(
            items.map(toUserResponse),
            query.from,
            query.from + items.length - 1,
            total,
            'Users retrieved successfully',
          );
    writeApiResult(res, result);
  }

  /**
   * 사용자를 생성합니다
   *
   * 201 응답에 Location 헤더와 self/update/delete 링크가 포함됩니다.
   */
  @Post('users')
  async create(@Body() dto: CreateUserDto, @Res() res: Response): Promise<void> {
    const user = await this.userService.create({
      name: dto.name,
      email: dto.email,
      password: dto.password,
      phone: dto.phone,
      dateOfBirth: dto.date_of_birth,
      gender: dto.gender,
      avatar: dto.avatar,
    });

    const location = this.url(`/users/${user.code}`);
    const result = this.builder()
      .withLinks({
        self: location,
        update: this.url(`/users/${user.id}`),
        delete: this.url(`/users/${user.id}`),
      })
      .createdResponse(toUserResponse(user), 'User created successfully', location);
    writeApiResult(res, result);
  }

  @Post('users/bulk-delete')
  async bulkDelete(@Body() dto: BulkDeleteDto, @Res() res: Response): Promise<void> {
    const results: BulkItemResult[] = [];
    let successful = 0;

    for (const id of dto.ids) {
      try {
        const user = await this.userService.getById(id);
        if (!user) {
          results.push({ id, status: 'failed', error: 'User not found' });
          continue;
        }

        await this.userService.delete(user);
        results.push({ id, status: 'deleted' });
        successful++;
      } catch (error) {
        results.push({ id, status: 'failed', error: errorMessage(error) });
      }
    }

    writeApiResult(
      res,
      this.builder().bulkOperationResponse(successful, dto.ids.length - successful, results, 'delete'),
    );
  }

  @Get('users/:code')
  async show(@Param('code') code: string, @Res() res: Response): Promise<void> {
    const user = await this.userService.getByCode(code);
    const result = user
      ? this.builder()
          .withLinks({ self: this.url(`/users/${user.code}`) })
          .successResponse(toUserResponse(user), 'User retrieved successfully')
      : this.builder().notFoundResponse('User not found', 'User');
    writeApiResult(res, result);
  }

  @Put('users/:id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateUserDto,
    @Res() res: Response,
  ): Promise<void> {
    await this.withUser(res, await this.userService.getById(id), async (user) => {
      const updated = await this.userService.update(user, {
        name: dto.name,
        email: dto.email,
        password: dto.password,
        phone: dto.phone,
        dateOfBirth: dto.date_of_birth,
        gender: dto.gender,
        avatar: dto.avatar,
        enable: dto.enable,
      });
      return this.builder().successResponse(toUserResponse(updated), 'User updated successfully');
    });
  }

  @Delete('users/:id')
  async remove(@Param('id', ParseIntPipe) id: number, @Res() res: Response): Promise<void> {
    await this.withUser(res, await this.userService.getById(id), async (user) => {
      await this.userService.delete(user);
      return this.builder().successResponse({ deleted: true }, 'User deleted successfully');
    });
  }

  @Delete('users/:id/force')
  async forceRemove(@Param('id', ParseIntPipe) id: number, @Res() res: Response): Promise<void> {
    const user = (await this.userService.getById(id)) ?? (await this.userService.getTrashedById(id));
    await this.withUser(res, user, async (target) => {
      await this.userService.forceDelete(target);
      return this.builder().successResponse({ deleted: true, permanent: true }, 'User permanently deleted');
    });
  }

  @Post('users/:id/restore')
  async restore(@Param('id', ParseIntPipe) id: number, @Res() res: Response): Promise<void> {
    await this.withUser(res, await this.userService.getTrashedById(id), async (user) => {
      const restored = await this.userService.restore(user);
      return this.builder().successResponse(toUserResponse(restored), 'User restored successfully');
    });
  }

  @Post('users/:id/enable')
  async enable(@Param('id', ParseIntPipe) id: number, @Res() res: Response): Promise<void> {
    await this.withUser(res, await this.userService.getById(id), async (user) => {
      const enabled = await this.userService.enable(user);
      return this.builder().successResponse(toUserResponse(enabled), 'User enabled successfully');
    });
  }

  @Post('users/:id/disable')
  async disable(@Param('id', ParseIntPipe) id: number, @Res() res: Response): Promise<void> {
    await this.withUser(res, await this.userService.getById(id), async (user) => {
      const disabled = await this.userService.disable(user);
      return this.builder().successResponse(toUserResponse(disabled), 'User disabled successfully');
    });
  }

  @Post('users/:id/lock')
  async lock(
    @Param('id', ParseIntPipe) id: number,
    @Query() query: LockUserQueryDto,
    @Res() res: Response,
  ): Promise<void> {
    await this.withUser(res, await this.userService.getById(id), async (user) => {
      const locked = await this.userService.lock(user, query.seconds);
      return this.builder()
        .withMeta({ lock_seconds: query.seconds })
        .successResponse(toUserResponse(locked), 'User locked successfully');
    });
  }

  @Post('users/:id/unlock')
  async unlock(@Param('id', ParseIntPipe) id: number, @Res() res: Response): Promise<void> {
    await this.withUser(res, await this.userService.getById(id), async (user) => {
      const unlocked = await this.userService.unlock(user);
      return this.builder().successResponse(toUserResponse(unlocked), 'User unlocked successfully');
    });
  }

  /**
   * 대상 사용자가 없으면 404, 있으면 action 결과로 응답합니다
   */
  private async withUser(
    res: Response,
    user: User | null,
    action: (user: User) => Promise<ApiResult>,
  ): Promise<void> {
    if (!user) {
      writeApiResult(res, this.builder().notFoundResponse('User not found', 'User'));
      return;
    }
    writeApiResult(res, await action(user));
  }

  private builder(): ResponseBuilder {
    return this.responses
      .create('UserController')
      .setCorrelationId(this.requestContext.getCorrelationId());
  }

  private url(path: string): string {
    return `/${this.apiPrefix}${path}`;
  }
}
