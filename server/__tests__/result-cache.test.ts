import { describe, it, expect, vi } from "vitest";
import { ResultCache } from "../engine/result-cache";

vi.mock("../core/logger", () => ({
  log: vi.fn(),
}));

function createCache(ttlMs = 25_000) {
  let now = 1_000_000;
  const clock = () => now;
  const advance = (ms: number) => {
    now += ms;
  };
  return { cache: new ResultCache<{ value: number }>({ ttlMs, clock }), advance };
}

describe("ResultCache", () => {
  it("returns the cached value for the same key within the TTL", () => {
    const { cache, advance } = createCache();
    const compute = vi.fn(() => ({ value: 1 }));

    const first = cache.getOrCompute("a", compute);
    advance(24_999);
    const second = cache.getOrCompute("a", compute);

    expect(first.fromCache).toBe(false);
    expect(second.fromCache).toBe(true);
    expect(second.value).toBe(first.value);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("recomputes after the TTL has expired", () => {
    const { cache, advance } = createCache();
    const compute = vi.fn(() => ({ value: 1 }));

    cache.getOrCompute("a", compute);
    advance(25_000);
    const result = cache.getOrCompute("a", compute);

    expect(result.fromCache).toBe(false);
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it("replaces the entry when the key changes", () => {
    const { cache } = createCache();

    cache.getOrCompute("a", () => ({ value: 1 }));
    const b = cache.getOrCompute("b", () => ({ value: 2 }));
    const a = cache.getOrCompute("a", () => ({ value: 3 }));

    expect(b.fromCache).toBe(false);
    expect(a).toEqual({ value: { value: 3 }, fromCache: false });
    expect(cache.get("b")).toBeNull();
  });

  it("keeps the previous entry when the computation throws", () => {
    const { cache } = createCache();
    cache.getOrCompute("a", () => ({ value: 1 }));

    expect(() =>
      cache.getOrCompute("b", () => {
        throw new Error("kaputt");
      }),
    ).toThrow("kaputt");
    expect(cache.peek()?.key).toBe("a");
    expect(cache.peek()?.value).toEqual({ value: 1 });
  });

  it("does not offer an expired entry as fallback", () => {
    const { cache, advance } = createCache(1_000);
    cache.getOrCompute("a", () => ({ value: 1 }));
    advance(1_000);

    expect(cache.peek()).toBeNull();
  });

  it("drops the entry on invalidate", () => {
    const { cache } = createCache();
    cache.getOrCompute("a", () => ({ value: 1 }));

    cache.invalidate("Test");

    expect(cache.get("a")).toBeNull();
    expect(cache.getStats().hasEntry).toBe(false);
  });

  it("counts hits and misses", () => {
    const { cache } = createCache();
    cache.getOrCompute("a", () => ({ value: 1 }));
    cache.getOrCompute("a", () => ({ value: 1 }));
    cache.getOrCompute("a", () => ({ value: 1 }));

    expect(cache.getStats()).toEqual({ hits: 2, misses: 1, ttlMs: 25_000, hasEntry: true });
  });
});
