import { DEFAULT_PAGE_LIMIT } from '../constants';
import { IndexOutOfRangeError } from '../errors';
import { debug } from '../utils/logger';

export interface Page<T> {
  items: T[];
  // The server's count of the whole collection when the page was produced.
  totalCount: number;
}

export type PageFetcher<T> = (offset: number, limit: number) => Promise<Page<T>>;

/**
 * Resolve sequence slice bounds against a known length.
 * Returns the first position and the exclusive end in the direction of `step`.
 */
function sliceBounds(length: number, step: number, start?: number, stop?: number): [number, number] {
  const lower = step < 0 ? -1 : 0;
  const upper = step < 0 ? length - 1 : length;

  const clamp = (value: number | undefined, fallback: number) => {
    if (value === undefined) return fallback;
    if (value < 0) return Math.max(value + length, lower);
    return Math.min(value, upper);
  };

  return [clamp(start, step < 0 ? upper : lower), clamp(stop, step < 0 ? lower : upper)];
}

/**
 * A read-only sequence over a remote paginated collection.
 *
 * Page `p` holds positions `[p * limit, (p + 1) * limit)` and is fetched with
 * `fetcher(p * limit, limit)` at most once per instance; fetched pages are kept
 * for the lifetime of the instance. `get` with a non-negative index walks the
 * missing pages up to its position in order; slices and negative indices fetch
 * only the pages holding the positions they select. The collection size is the
 * one reported by the most recent fetch, and is fixed once a short page shows
 * where the collection ends.
 *
 * Concurrent consumers awaiting the same page share its in-flight request.
 */
export class LazyPagingList<T> implements AsyncIterable<T> {
  readonly limit: number;

  private readonly fetcher: PageFetcher<T>;
  private readonly pages = new Map<number, T[]>();
  private readonly inflight = new Map<number, Promise<void>>();
  private totalCount: number | undefined;
  private exhausted = false;

  constructor(fetcher: PageFetcher<T>, limit: number = DEFAULT_PAGE_LIMIT) {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new RangeError(`Page limit must be a positive integer, got ${limit}`);
    }
    this.fetcher = fetcher;
    this.limit = limit;
  }

  /** The collection size, fetching the first page if it is not known yet. */
  async length(): Promise<number> {
    if (this.totalCount === undefined) {
      await this.fetchPage(0);
    }
    return this.totalCount ?? 0;
  }

  /**
   * The item at `index`. Negative indices count from the end of the collection.
   * @throws IndexOutOfRangeError when the position is outside the collection.
   */
  async get(index: number): Promise<T> {
    if (!Number.isInteger(index)) {
      throw new TypeError(`List index must be an integer, got ${index}`);
    }

    let slot: { item: T } | undefined;
    if (index < 0) {
      const position = index + (await this.length());
      slot = position < 0 ? undefined : await this.fetchSlot(position);
    } else {
      slot = await this.fillTo(index);
    }

    if (slot === undefined) {
      throw new IndexOutOfRangeError(index, this.totalCount);
    }
    return slot.item;
  }

  /**
   * Lazily produce the items selected by a sequence slice. Out-of-range
   * bounds are clamped and only the pages holding selected positions are
   * fetched.
   */
  async *slice(start?: number, stop?: number, step: number = 1): AsyncGenerator<T, void, undefined> {
    if (!Number.isInteger(step) || step === 0) {
      throw new RangeError(`Slice step must be a non-zero integer, got ${step}`);
    }

    // Forward slices with non-negative bounds need no length up front.
    if (step > 0 && (start ?? 0) >= 0 && (stop === undefined || stop >= 0)) {
      for (let position = start ?? 0; stop === undefined || position < stop; position += step) {
        const slot = await this.fetchSlot(position);
        if (slot === undefined) return;
        yield slot.item;
      }
      return;
    }

    const [first, end] = sliceBounds(await this.length(), step, start, stop);
    for (let position = first; step > 0 ? position < end : position > end; position += step) {
      const slot = await this.fetchSlot(position);
      if (slot === undefined) return;
      yield slot.item;
    }
  }

  /** Every item in order. Iterating again replays the cache and fetches only what is missing. */
  iterate(): AsyncGenerator<T, void, undefined> {
    return this.slice(0);
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.iterate();
  }

  async toArray(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this.iterate()) {
      items.push(item);
    }
    return items;
  }

  private pageOf(position: number): number {
    return Math.floor(position / this.limit);
  }

  private pastEnd(page: number): boolean {
    return this.totalCount !== undefined && page * this.limit >= this.totalCount;
  }

  /** The cached item at `position`, if that position exists. */
  private slot(position: number): { item: T } | undefined {
    if (this.totalCount !== undefined && position >= this.totalCount) {
      return undefined;
    }
    const items = this.pages.get(this.pageOf(position));
    const offset = position % this.limit;
    return items !== undefined && offset < items.length ? { item: items[offset] } : undefined;
  }

  /** Fetch the page holding `position` alone, unless it is cached or past the end. */
  private async fetchSlot(position: number): Promise<{ item: T } | undefined> {
    const page = this.pageOf(position);
    if (!this.pages.has(page) && !this.pastEnd(page)) {
      await this.fetchPage(page);
    }
    return this.slot(position);
  }

  /** Fetch the missing pages up to the one holding `position`, in ascending order. */
  private async fillTo(position: number): Promise<{ item: T } | undefined> {
    const last = this.pageOf(position);
    for (let page = 0; page <= last && !this.pastEnd(page); page++) {
      if (!this.pages.has(page)) {
        await this.fetchPage(page);
      }
    }
    return this.slot(position);
  }

  private fetchPage(page: number): Promise<void> {
    let pending = this.inflight.get(page);
    if (pending === undefined) {
      pending = this.loadPage(page).finally(() => {
        this.inflight.delete(page);
      });
      this.inflight.set(page, pending);
    }
    return pending;
  }

  private async loadPage(page: number): Promise<void> {
    const offset = page * this.limit;
    debug(`Fetching page at offset ${offset} (limit ${this.limit})`);

    // Errors propagate before any state changes, so cached pages stay valid.
    const result = await this.fetcher(offset, this.limit);
    const items = result.items.slice(0, this.limit);

    let total = this.totalCount ?? result.totalCount;
    if (!this.exhausted) {
      total = result.totalCount;
      if (items.length < this.limit) {
        total = Math.min(result.totalCount, offset + items.length);
        this.exhausted = true;
      }
      this.totalCount = total;
    }

    this.pages.set(page, items.slice(0, Math.max(0, total - offset)));
  }
}
