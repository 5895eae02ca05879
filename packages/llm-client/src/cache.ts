/**
 * Time-bounded memo of one-shot responses.
 */

import { createHash } from "node:crypto";
import type { RequestDescriptor } from "./types/index.js";
import { parseJsonBody, stableStringify } from "./utils/index.js";

interface CacheEntry<T> {
  value: T;
  createdAt: number;
}

export class ResponseCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  /**
   * @param ttlMs - An entry is served while its age is below this.
   * @param now - Clock in milliseconds; injectable for tests.
   */
  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() - entry.createdAt >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  /** Store `value`, dropping every entry that has already expired. */
  set(key: string, value: T): void {
    const now = this.now();
    for (const [storedKey, entry] of this.entries) {
      if (now - entry.createdAt >= this.ttlMs) {
        this.entries.delete(storedKey);
      }
    }
    this.entries.set(key, { value, createdAt: now });
  }

  clear(): void {
    this.entries.clear();
  }

  /** Number of stored entries, expired ones included until the next `set` or read. */
  get size(): number {
    return this.entries.size;
  }
}

/**
 * Key over the provider and the prepared wire request. The request body is
 * decoded and re-serialized with sorted keys, so member order in caller
 * supplied values (tool schemas, response formats) does not matter.
 */
export function cacheKey(provider: string, request: RequestDescriptor): string {
  const decoded = parseJsonBody(request.body);
  const material = stableStringify({
    provider,
    url: request.url,
    body: decoded.ok ? decoded.value : request.body,
  });
  return createHash("sha256").update(material).digest("hex");
}
