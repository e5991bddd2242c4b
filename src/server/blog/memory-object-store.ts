import type { ListOptions, ListPage, ObjectBody, ObjectStore } from '@/server/blog/object-store';

type MemoryObjectStoreOptions = {
  /**
   * Maximum entries (keys plus common prefixes) returned per list call.
   */
  pageSize?: number;
  seed?: Record<string, ObjectBody>;
};

function toBytes(body: ObjectBody): Uint8Array {
  return typeof body === 'string' ? new TextEncoder().encode(body) : new Uint8Array(body);
}

/**
 * Bucket kept in process memory. Listing follows S3 semantics: keys come back
 * in lexical order, keys sharing a prefix up to the delimiter roll up into a
 * single common prefix, and results are paged with an opaque token.
 */
export class MemoryObjectStore implements ObjectStore {
  readonly name = 'memory';
  private readonly objects = new Map<string, Uint8Array>();
  private readonly pageSize: number;

  constructor(options: MemoryObjectStoreOptions = {}) {
    this.pageSize = Math.max(1, options.pageSize ?? 1000);
    for (const [key, body] of Object.entries(options.seed ?? {})) {
      this.objects.set(key, toBytes(body));
    }
  }

  async list(prefix: string, options: ListOptions = {}): Promise<ListPage> {
    const entries: { value: string; isPrefix: boolean }[] = [];
    const seenPrefixes = new Set<string>();
    const sortedKeys = Array.from(this.objects.keys())
      .filter((key) => key.startsWith(prefix))
      .sort();

    for (const key of sortedKeys) {
      if (options.delimiter) {
        const index = key.indexOf(options.delimiter, prefix.length);
        if (index >= 0) {
          const commonPrefix = key.slice(0, index + options.delimiter.length);
          if (!seenPrefixes.has(commonPrefix)) {
            seenPrefixes.add(commonPrefix);
            entries.push({ value: commonPrefix, isPrefix: true });
          }
          continue;
        }
      }
      entries.push({ value: key, isPrefix: false });
    }

    const start = options.continuationToken ? Number.parseInt(options.continuationToken, 10) : 0;
    if (!Number.isInteger(start) || start < 0) {
      throw new Error(`Invalid continuation token "${options.continuationToken}"`);
    }
    const slice = entries.slice(start, start + this.pageSize);
    const end = start + slice.length;

    return {
      keys: slice.filter((entry) => !entry.isPrefix).map((entry) => entry.value),
      commonPrefixes: slice.filter((entry) => entry.isPrefix).map((entry) => entry.value),
      nextToken: end < entries.length ? String(end) : undefined,
    };
  }

  async get(key: string): Promise<Uint8Array | null> {
    const body = this.objects.get(key);
    return body ? new Uint8Array(body) : null;
  }

  async put(key: string, body: ObjectBody): Promise<void> {
    this.objects.set(key, toBytes(body));
  }

  async delete(key: string): Promise<void> {
    this.objects.delete(key);
  }

  keys(): string[] {
    return Array.from(this.objects.keys()).sort();
  }

  has(key: string): boolean {
    return this.objects.has(key);
  }
}
