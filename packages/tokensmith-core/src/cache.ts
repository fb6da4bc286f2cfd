import type { CompiledMatcher } from "./matcher/compiled-matcher.ts";

export const DEFAULT_CACHE_SIZE = 256;

type CacheEntry = {
  revision: number;
  matcher: CompiledMatcher;
};

export type CacheLookup = {
  matcher: CompiledMatcher;
  hit: boolean;
};

/**
 * Compiled matchers keyed by template and flags. An entry only serves the registry revision it
 * was compiled against; the oldest entry is evicted once `capacity` is reached.
 */
export class PatternCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(readonly capacity: number = DEFAULT_CACHE_SIZE) {}

  get size(): number {
    return this.entries.size;
  }

  getOrCompile(
    template: string,
    flags: string,
    revision: number,
    compile: () => CompiledMatcher,
  ): CacheLookup {
    const key = `${flags}\u0000${template}`;
    const cached = this.entries.get(key);
    if (cached && cached.revision === revision) {
      return { matcher: cached.matcher, hit: true };
    }

    // Errors propagate before anything is stored.
    const matcher = compile();
    if (this.capacity <= 0) {
      return { matcher, hit: false };
    }

    this.entries.delete(key);
    while (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, { revision, matcher });
    return { matcher, hit: false };
  }

  clear(): void {
    this.entries.clear();
  }
}
