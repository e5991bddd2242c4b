import type { Post } from '@/types/blog';
import { StoreUnavailableError } from '@/server/blog/errors';
import { MemoryObjectStore } from '@/server/blog/memory-object-store';
import type { ListOptions, ListPage, ObjectBody, ObjectStore } from '@/server/blog/object-store';

export function makePost(overrides: Partial<Post> & Pick<Post, 'slug'>): Post {
  return {
    date: '2024-01-01',
    title: 'A post',
    contentType: 'markdown',
    published: false,
    imageIds: [],
    labels: [],
    content: 'Hello there',
    ...overrides,
  };
}

type Operation = 'list' | 'get' | 'put' | 'delete';
type FailureRule = (operation: Operation, key: string) => boolean;

/**
 * Wraps a MemoryObjectStore and fails the calls matched by `failWhen`, the way
 * an adapter reports a transport failure.
 */
export class FlakyObjectStore implements ObjectStore {
  readonly name = 'flaky';
  readonly inner: MemoryObjectStore;
  readonly calls: { operation: Operation; key: string }[] = [];
  private rule: FailureRule | null = null;

  constructor(inner: MemoryObjectStore = new MemoryObjectStore()) {
    this.inner = inner;
  }

  failWhen(rule: FailureRule | null): void {
    this.rule = rule;
  }

  private check(operation: Operation, key: string): void {
    this.calls.push({ operation, key });
    if (this.rule?.(operation, key)) {
      throw new StoreUnavailableError(operation, key, new Error('connection reset'));
    }
  }

  async list(prefix: string, options?: ListOptions): Promise<ListPage> {
    this.check('list', prefix);
    return this.inner.list(prefix, options);
  }

  async get(key: string): Promise<Uint8Array | null> {
    this.check('get', key);
    return this.inner.get(key);
  }

  async put(key: string, body: ObjectBody): Promise<void> {
    this.check('put', key);
    return this.inner.put(key, body);
  }

  async delete(key: string): Promise<void> {
    this.check('delete', key);
    return this.inner.delete(key);
  }
}

/**
 * Puts an empty page that still carries a continuation token in front of
 * every page of the wrapped store.
 */
export class GappyObjectStore implements ObjectStore {
  readonly name = 'gappy';
  readonly inner: MemoryObjectStore;

  constructor(inner: MemoryObjectStore = new MemoryObjectStore()) {
    this.inner = inner;
  }

  async list(prefix: string, options: ListOptions = {}): Promise<ListPage> {
    const token = options.continuationToken;
    if (token === undefined || token.startsWith('gap:')) {
      return { keys: [], commonPrefixes: [], nextToken: `page:${token?.slice('gap:'.length) ?? ''}` };
    }
    const innerToken = token.slice('page:'.length) || undefined;
    const page = await this.inner.list(prefix, { delimiter: options.delimiter, continuationToken: innerToken });
    return { ...page, nextToken: page.nextToken === undefined ? undefined : `gap:${page.nextToken}` };
  }

  get(key: string): Promise<Uint8Array | null> {
    return this.inner.get(key);
  }

  put(key: string, body: ObjectBody): Promise<void> {
    return this.inner.put(key, body);
  }

  delete(key: string): Promise<void> {
    return this.inner.delete(key);
  }
}
