/**
 * 페이지네이션 결과
 *
 * 한 페이지의 항목과 전체 개수, 링크 생성을 위한 경로/쿼리를 보관합니다.
 * ResponseBuilder.paginatedResponse()가 pagination 블록과 링크를 만들 때 사용합니다.
 *
 * @example
 * ```typescript
 * const page = new Paginated(users, 42, 15, 2).withPath('/api/users').appends({ search: 'kim' });
 * page.lastPage;   // 3
 * page.from;       // 16
 * page.url(3);     // '/api/users?search=kim&page=3'
 * ```
 */
export class Paginated<T> {
  readonly perPage: number;

  constructor(
    readonly items: T[],
    readonly total: number,
    perPage: number,
    readonly currentPage: number,
    readonly path = '/',
    readonly query: Record<string, string> = {},
  ) {
    this.perPage = Math.max(1, perPage);
  }

  /** 마지막 페이지 번호 (항목이 없어도 1) */
  get lastPage(): number {
    return Math.max(1, Math.ceil(this.total / this.perPage));
  }

  /** 현재 페이지 첫 항목의 1부터 시작하는 순번 */
  get from(): number | null {
    return this.items.length === 0 ? null : (this.currentPage - 1) * this.perPage + 1;
  }

  /** 현재 페이지 마지막 항목의 순번 */
  get to(): number | null {
    const from = this.from;
    return from === null ? null : from + this.items.length - 1;
  }

  get hasMorePages(): boolean {
    return this.currentPage < this.lastPage;
  }

  /**
   * 지정한 페이지의 URL을 만듭니다
   */
  url(page: number): string {
    const params = new URLSearchParams({ ...this.query, page: String(page) });
    return `${this.path}?${params.toString()}`;
  }

  map<U>(mapper: (item: T) => U): Paginated<U> {
    return new Paginated(
      this.items.map(mapper),
      this.total,
      this.perPage,
      this.currentPage,
      this.path,
      this.query,
    );
  }

  withPath(path: string): Paginated<T> {
    return new Paginated(this.items, this.total, this.perPage, this.currentPage, path, this.query);
  }

  /**
   * 링크에 유지할 쿼리 파라미터를 추가합니다 (빈 값은 제외)
   */
  appends(query: Record<string, string | undefined>): Paginated<T> {
    const merged: Record<string, string> = { ...this.query };
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined && value !== '') {
        merged[key] = value;
      }
    }
    return new Paginated(this.items, this.total, this.perPage, this.currentPage, this.path, merged);
  }
}
