import { LRUCache } from 'lru-cache';

export class MemoryCache<TValue extends object> {
  private readonly cache: LRUCache<string, TValue>;

  public constructor(options: { maxEntries: number }) {
    this.cache = new LRUCache<string, TValue>({ max: options.maxEntries });
  }

  public get(key: string): TValue | undefined {
    return this.cache.get(key);
  }

  public set(key: string, value: TValue): void {
    this.cache.set(key, value);
  }
}
