import { createHash } from "node:crypto";

export type EventCacheKeyInput = {
  subjectId: string;
  windowStart: Date;
  windowEnd: Date;
  endpoint: string;
};

type EventCacheOptions = {
  maxEntries: number;
};

export interface EventCache<T> {
  get(key: string): T | undefined;
  /** Returns false when the key is already present; entries are set once. */
  set(key: string, value: T): boolean;
  has(key: string): boolean;
  size(): number;
  capacity(): number;
  enabled(): boolean;
  clear(): void;
}

export function buildEventCacheKey(input: EventCacheKeyInput): string {
  const digest = createHash("sha256");
  digest.update(`endpoint:${input.endpoint}\n`);
  digest.update(`subject:${input.subjectId}\n`);
  digest.update(`start:${input.windowStart.toISOString()}\n`);
  digest.update(`end:${input.windowEnd.toISOString()}\n`);
  return digest.digest("hex");
}

/**
 * Fixed-capacity FIFO cache: values live in a ring of slots, a map points each
 * key at its slot, and the write cursor overwrites the oldest slot once full.
 * No TTL; entries last until evicted or the process exits.
 */
export function createEventCache<T>(options: EventCacheOptions): EventCache<T> {
  const maxEntries = Math.max(0, Math.min(5_000, Math.floor(Number(options.maxEntries || 0))));
  const slots: ({ key: string; value: T } | undefined)[] = new Array(maxEntries).fill(undefined);
  const index = new Map<string, number>();
  let cursor = 0;

  function enabled(): boolean {
    return maxEntries > 0;
  }

  function get(key: string): T | undefined {
    const slot = index.get(key);
    if (slot === undefined) return undefined;
    return slots[slot]?.value;
  }

  function set(key: string, value: T): boolean {
    if (!enabled() || index.has(key)) return false;

    const evicted = slots[cursor];
    if (evicted) index.delete(evicted.key);

    slots[cursor] = { key, value };
    index.set(key, cursor);
    cursor = (cursor + 1) % maxEntries;
    return true;
  }

  function clear(): void {
    slots.fill(undefined);
    index.clear();
    cursor = 0;
  }

  return {
    get,
    set,
    has: (key) => index.has(key),
    size: () => index.size,
    capacity: () => maxEntries,
    enabled,
    clear,
  };
}
