export const PAGE_SIZE = 100;

/**
 * Fetches one page (1-based). Any backoff happens inside, so a retried page
 * never re-yields the pages before it.
 */
export type PageFetcher<T> = (page: number, perPage: number) => Promise<T[]>;

export interface PaginatorOptions {
  perPage?: number;
  /** Stop once this many items were yielded */
  maxItems?: number;
}

/**
 * Drives a paged list endpoint to exhaustion.
 *
 * Iteration stops after the first page holding fewer than `perPage` items;
 * that short (possibly empty) page is yielded first. Each `fetchAll()` call
 * issues the requests anew.
 */
export class Paginator<T> {
  private readonly perPage: number;
  private readonly maxItems?: number;

  constructor(
    private readonly fetchPage: PageFetcher<T>,
    options: PaginatorOptions = {}
  ) {
    this.perPage = options.perPage ?? PAGE_SIZE;
    this.maxItems = options.maxItems;
  }

  async *fetchAll(): AsyncGenerator<T, void, undefined> {
    let yielded = 0;

    for (let page = 1; ; page++) {
      const items = await this.fetchPage(page, this.perPage);

      for (const item of items) {
        if (this.reachedLimit(yielded)) return;
        yield item;
        yielded++;
      }

      if (items.length < this.perPage || this.reachedLimit(yielded)) {
        return;
      }
    }
  }

  private reachedLimit(yielded: number): boolean {
    return this.maxItems !== undefined && yielded >= this.maxItems;
  }
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

export async function countItems(source: AsyncIterable<unknown>): Promise<number> {
  let total = 0;
  for await (const _item of source) {
    total++;
  }
  return total;
}
