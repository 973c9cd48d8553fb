import { CacheBackend } from "../lib/cache";

type Operation = "get" | "set" | "ttl";

interface Entry {
  value: Buffer;
  expiresAt: number | null;
}

/** In-process cache backend with a settable clock, for tests. */
export class MemoryCacheStore implements CacheBackend {
  readonly name = "memory";
  readonly entries = new Map<string, Entry>();
  readonly failing = new Set<Operation>();
  readonly calls: Operation[] = [];
  now = 0;

  advance(seconds: number): void {
    this.now += seconds * 1000;
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt !== null && entry.expiresAt <= this.now) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private record(operation: Operation): void {
    this.calls.push(operation);
    if (this.failing.has(operation)) {
      throw new Error(`memory store ${operation} unavailable`);
    }
  }

  async get(key: string): Promise<Buffer | null> {
    this.record("get");
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: Buffer, ttlSeconds: number): Promise<void> {
    this.record("set");
    this.entries.set(key, { value, expiresAt: this.now + ttlSeconds * 1000 });
  }

  async ttl(key: string): Promise<number> {
    this.record("ttl");
    const entry = this.live(key);
    if (!entry) {
      return -2;
    }
    if (entry.expiresAt === null) {
      return -1;
    }
    return Math.ceil((entry.expiresAt - this.now) / 1000);
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}
