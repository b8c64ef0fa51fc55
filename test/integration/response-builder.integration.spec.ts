/**
 * Response Builder Integration Tests
 *
 * Tests the uniform API envelope:
 * - Key order, security headers and correlation id
 * - Per-status helpers (201, 204, 401, 403, 404, 422, 429, 206)
 * - Pagination links, bulk summaries and collections
 * - Exception reporting and debug blocks outside production
 * - Reset of configured state after every terminal call
 */

import { Paginated } from '../../src/common/pagination/paginated';
import { formatErrors } from '../../src/common/response/format-errors';
import {
  ResponseBuilder,
  SECURITY_HEADERS,
  ServiceErrorSink,
} from '../../src/common/response/response-builder';

describe('ResponseBuilder', () => {
  let logServiceError: jest.Mock;
  let sink: ServiceErrorSink;

  const build = (production = false, requestId?: string): ResponseBuilder =>
    new ResponseBuilder({ production, errorSink: sink, requestId, source: 'UserController' });

  beforeEach(() => {
    logServiceError = jest.fn();
    sink = { logServiceError };
  });

  describe('envelope', () => {
    it('should emit keys in envelope order with security and correlation headers', () => {
      const result = build(false, 'req-42').setCorrelationId('corr-1').successResponse({ id: 1 }, 'Loaded');

      expect(result.statusCode).toBe(200);
      expect(result.headers).toEqual({ ...SECURITY_HEADERS, 'X-Correlation-ID': 'corr-1' });
      expect(Object.keys(result.body ?? {})).toEqual([
        'success',
        'message',
        'code',
        'data',
        'correlation_id',
        'timestamp',
        'request_id',
      ]);
      expect(result.body).toMatchObject({
        success: true,
        message: 'Loaded',
        code: 200,
        data: { id: 1 },
        correlation_id: 'corr-1',
        request_id: 'req-42',
      });
      expect(result.body?.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });

    it('should omit data when none is given and keep an explicit null', () => {
      const builder = build();

      expect(builder.successResponse().body).not.toHaveProperty('data');
      expect(builder.successResponse(null).body).toHaveProperty('data', null);
    });

    it('should reset correlation id, links and meta after each response', () => {
      const builder = build().setCorrelationId('corr-1').withLinks({ self: '/api/users' }).withMeta({ a: 1 });

      builder.successResponse({});
      const second = builder.successResponse({});

      expect(second.body).not.toHaveProperty('correlation_id');
      expect(second.body).not.toHaveProperty('links');
      expect(second.body).not.toHaveProperty('meta');
      expect(second.headers).toEqual(SECURITY_HEADERS);
    });

    it('should not carry debug details into the next response', () => {
      const builder = build().withDebug({ query: 'SELECT 1' });

      const first = builder.successResponse({});
      const second = builder.successResponse({});

      expect(first.body?.debug).toEqual({ query: 'SELECT 1' });
      expect(second.body).not.toHaveProperty('debug');
    });

    it('should not carry exception details into the next response', () => {
      const builder = build();

      const failed = builder.errorResponse('Lookup failed', 400, undefined, new Error('Connection lost'));
      const next = builder.successResponse({});

      expect(failed.body).toHaveProperty('debug');
      expect(next.body).not.toHaveProperty('debug');
    });

    it('should merge repeated withMeta and withLinks calls', () => {
      const result = build().withMeta({ a: 1 }).withMeta({ b: 2 }).withLinks({ self: '/x' }).successResponse({});

      expect(result.body?.meta).toEqual({ a: 1, b: 2 });
      expect(result.body?.links).toEqual({ self: '/x' });
    });
  });

  describe('status helpers', () => {
    it('should set Location on created responses', () => {
      const result = build().createdResponse({ id: 7 }, 'User created successfully', '/api/users/7');

      expect(result.statusCode).toBe(201);
      expect(result.headers.Location).toBe('/api/users/7');
      expect(result.body?.message).toBe('User created successfully');
    });

    it('should return 202 for accepted work', () => {
      expect(build().acceptedResponse({ job: 'export' }).statusCode).toBe(202);
    });

    it('should return no body for 204 but keep headers', () => {
      const result = build().setCorrelationId('corr-2').noContentResponse();

      expect(result).toEqual({
        statusCode: 204,
        headers: { ...SECURITY_HEADERS, 'X-Correlation-ID': 'corr-2' },
        body: null,
      });
    });

    it('should name the resource in not-found messages', () => {
      expect(build().notFoundResponse('ignored', 'User').body?.message).toBe('User not found');
      expect(build().notFoundResponse().body?.message).toBe('Resource not found');
    });

    it('should format validation errors per field', () => {
      const result = build().validationErrorResponse({ email: ['The email field is required.'], name: 'Too long' });

      expect(result.statusCode).toBe(422);
      expect(result.body?.message).toBe('Validation failed');
      expect(result.body?.errors).toEqual([
        { field: 'email', messages: ['The email field is required.'] },
        { field: 'name', messages: ['Too long'] },
      ]);
    });

    it('should add a bearer challenge when a realm is given', () => {
      const result = build().unauthorizedResponse('Unauthorized', 'api');

      expect(result.statusCode).toBe(401);
      expect(result.headers['WWW-Authenticate']).toBe('Bearer realm="api"');
      expect(build().unauthorizedResponse().headers).not.toHaveProperty('WWW-Authenticate');
    });

    it('should expose the forbidden reason in meta', () => {
      const result = build().forbiddenResponse('Forbidden', 'account_locked');

      expect(result.statusCode).toBe(403);
      expect(result.body?.meta).toEqual({ reason: 'account_locked' });
    });

    it('should set Retry-After on 429 responses', () => {
      const result = build().tooManyRequestsResponse('Too many requests', 30);

      expect(result.statusCode).toBe(429);
      expect(result.headers['Retry-After']).toBe('30');
      expect(result.body?.meta).toEqual({ retry_after: 30 });
    });

    it('should carry conflicts as errors', () => {
      const result = build().conflictResponse('User already exists', { email: ['The email has already been taken.'] });

      expect(result.statusCode).toBe(409);
      expect(result.body?.errors).toEqual([{ field: 'email', messages: ['The email has already been taken.'] }]);
    });

    it('should describe partial content with Content-Range', () => {
      const result = build().partialContentResponse(['a', 'b'], 1, 2, 10);

      expect(result.statusCode).toBe(206);
      expect(result.headers['Content-Range']).toBe('items 1-2/10');
      expect(result.body?.meta).toEqual({ range: { from: 1, to: 2, total: 10 } });
    });
  });

  describe('exceptions and debug', () => {
    it('should report exceptions and describe them outside production', () => {
      const error = new TypeError('Cannot read properties of undefined');

      const result = build().serverErrorResponse('Internal server error', error);

      expect(logServiceError).toHaveBeenCalledWith('UserController', 'serverErrorResponse', error);
      expect(result.statusCode).toBe(500);
      expect(result.body?.debug).toMatchObject({
        exception: 'TypeError',
        message: 'Cannot read properties of undefined',
      });
    });

    it('should report but never expose debug details in production', () => {
      const error = new Error('db password rejected');

      const result = build(true).withDebug({ query: 'SELECT 1' }).errorResponse('Request failed', 400, undefined, error);

      expect(logServiceError).toHaveBeenCalledWith('UserController', 'errorResponse', error);
      expect(result.body).not.toHaveProperty('debug');
    });

    it('should not report when no exception is given', () => {
      build().errorResponse('Bad request');

      expect(logServiceError).not.toHaveBeenCalled();
    });
  });

  describe('collections', () => {
    it('should build pagination data and navigation links', () => {
      const page = new Paginated(['c', 'd'], 5, 2, 2).withPath('/api/users').appends({ search: 'kim' });

      const result = build().paginatedResponse(page, 'Users retrieved successfully');

      expect(result.body?.data).toEqual({
        items: ['c', 'd'],
        pagination: {
          current_page: 2,
          per_page: 2,
          total: 5,
          last_page: 3,
          from: 3,
          to: 4,
          has_more_pages: true,
        },
      });
      expect(result.body?.links).toEqual({
        self: '/api/users?search=kim&page=2',
        first: '/api/users?search=kim&page=1',
        last: '/api/users?search=kim&page=3',
        prev: '/api/users?search=kim&page=1',
        next: '/api/users?search=kim&page=3',
      });
    });

    it('should omit prev and next on a single page and let explicit links win', () => {
      const page = new Paginated(['a'], 1, 15, 1).withPath('/api/users');

      const result = build().withLinks({ self: '/custom' }).paginatedResponse(page);

      expect(result.body?.links).toEqual({
        self: '/custom',
        first: '/api/users?page=1',
        last: '/api/users?page=1',
      });
    });

    it('should skip links when asked', () => {
      const page = new Paginated<string>([], 0, 15, 1);

      expect(build().paginatedResponse(page, 'Success', false).body).not.toHaveProperty('links');
    });

    it('should summarize bulk operations', () => {
      const results = [
        { id: 1, status: 'deleted' },
        { id: 2, status: 'deleted' },
        { id: 999, status: 'failed', error: 'User not found' },
      ];

      const result = build().bulkOperationResponse(2, 1, results, 'delete');

      expect(result.statusCode).toBe(200);
      expect(result.body?.message).toBe('Bulk delete completed: 2 successful, 1 failed');
      expect(result.body?.data).toEqual({ summary: { total: 3, successful: 2, failed: 1 }, results });
    });

    it('should leave out empty bulk results', () => {
      expect(build().bulkOperationResponse(0, 0).body?.data).toEqual({
        summary: { total: 0, successful: 0, failed: 0 },
      });
    });

    it('should count collection items in meta', () => {
      const result = build().collectionResponse([{ id: 1 }, { id: 2 }]);

      expect(result.body?.data).toEqual({ items: [{ id: 1 }, { id: 2 }] });
      expect(result.body?.meta).toEqual({ count: 2 });
    });
  });
});

describe('formatErrors', () => {
  it('should wrap a string in a single error', () => {
    expect(formatErrors('Invalid token')).toEqual([{ message: 'Invalid token' }]);
  });

  it('should pass lists through unchanged', () => {
    const errors = [{ code: 'E1' }];

    expect(formatErrors(errors)).toBe(errors);
  });
});

describe('Paginated', () => {
  it('should compute page bounds', () => {
    const page = new Paginated([1, 2, 3], 10, 3, 4);

    expect(page.lastPage).toBe(4);
    expect(page.from).toBe(10);
    expect(page.to).toBe(12);
    expect(page.hasMorePages).toBe(false);
  });

  it('should report empty pages with null bounds and one last page', () => {
    const page = new Paginated([], 0, 15, 1);

    expect(page.from).toBeNull();
    expect(page.to).toBeNull();
    expect(page.lastPage).toBe(1);
  });

  it('should clamp the page size to at least one', () => {
    expect(new Paginated([], 3, 0, 1).perPage).toBe(1);
  });

  it('should skip empty query values and keep them through map', () => {
    const page = new Paginated([1], 1, 15, 1)
      .withPath('/api/users')
      .appends({ search: '', per_page: '15', sort: undefined })
      .map((value) => value * 2);

    expect(page.items).toEqual([2]);
    expect(page.url(2)).toBe('/api/users?per_page=15&page=2');
  });
});
