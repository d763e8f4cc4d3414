import { log } from "../core/logger";

export interface CacheEntry<T> {
  readonly key: string;
  readonly value: T;
  readonly storedAt: number;
}

export interface ResultCacheOptions {
  ttlMs: number;
  /** Millisekunden-Uhr, in Tests ersetzbar */
  clock?: () => number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  ttlMs: number;
  hasEntry: boolean;
}

export interface CacheLookup<T> {
  value: T;
  fromCache: boolean;
}

/**
 * Ein-Eintrags-Cache für das zuletzt berechnete Ergebnis.
 *
 * Ein anderer Schlüssel ersetzt den Eintrag, nach Ablauf der TTL wird neu
 * berechnet. Wirft die Berechnung, bleibt der alte Eintrag stehen.
 */
export class ResultCache<T> {
  private entry: CacheEntry<T> | null = null;
  private hits = 0;
  private misses = 0;
  private readonly ttlMs: number;
  private readonly clock: () => number;

  constructor(options: ResultCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.clock = options.clock ?? Date.now;
  }

  private isFresh(entry: CacheEntry<T>): boolean {
    return this.clock() - entry.storedAt < this.ttlMs;
  }

  get(key: string): T | null {
    const entry = this.entry;
    if (!entry || entry.key !== key || !this.isFresh(entry)) return null;
    return entry.value;
  }

  getOrCompute(key: string, compute: () => T): CacheLookup<T> {
    const cached = this.get(key);
    if (cached !== null) {
      this.hits++;
      log("trace", "cache", "Cache-Treffer");
      return { value: cached, fromCache: true };
    }

    this.misses++;
    const previous = this.entry;
    if (previous && previous.key !== key) {
      log("debug", "cache", "Eingaben geändert, Ergebnis wird neu berechnet");
    } else if (previous) {
      log("debug", "cache", "Cache-Eintrag abgelaufen, Ergebnis wird neu berechnet");
    }

    const value = compute();
    this.entry = Object.freeze({ key, value, storedAt: this.clock() });
    return { value, fromCache: false };
  }

  /** Letzter noch gültiger Eintrag, unabhängig vom Schlüssel. */
  peek(): CacheEntry<T> | null {
    const entry = this.entry;
    return entry && this.isFresh(entry) ? entry : null;
  }

  invalidate(reason: string): void {
    if (this.entry) {
      log("debug", "cache", `Cache verworfen: ${reason}`);
    }
    this.entry = null;
  }

  getStats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      ttlMs: this.ttlMs,
      hasEntry: this.entry !== null,
    };
  }
}
