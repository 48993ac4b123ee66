/** One page of a query. Pages are numbered from 1. */
export class PageResult<T> {
  readonly totalPages: number;

  constructor(
    readonly content: T[],
    readonly page: number,
    readonly size: number,
    readonly totalElements: number,
  ) {
    this.totalPages = size > 0 ? Math.ceil(totalElements / size) : 0;
  }

  get hasNext(): boolean {
    return this.page < this.totalPages;
  }

  get hasPrevious(): boolean {
    return this.page > 1;
  }

  get isFirst(): boolean {
    return this.page === 1;
  }

  get isLast(): boolean {
    return this.page >= this.totalPages;
  }

  map<U>(mapper: (item: T) => U): PageResult<U> {
    return new PageResult(this.content.map(mapper), this.page, this.size, this.totalElements);
  }

  toString(): string {
    return `PageResult{page=${this.page}, size=${this.size}, totalElements=${this.totalElements}, totalPages=${this.totalPages}}`;
  }
}
