export type ListOptions = {
  delimiter?: string;
  continuationToken?: string;
};

export type ListPage = {
  keys: string[];
  commonPrefixes: string[];
  /**
   * Present when more results follow. A page may be empty and still carry a
   * token; callers must keep going until the token is absent.
   */
  nextToken?: string;
};

export type ObjectBody = Uint8Array | string;

export interface ObjectStore {
  readonly name: string;

  list(prefix: string, options?: ListOptions): Promise<ListPage>;

  /**
   * Resolve the object body, or null when the key does not exist.
   */
  get(key: string): Promise<Uint8Array | null>;

  put(key: string, body: ObjectBody): Promise<void>;

  /**
   * Deleting a key that does not exist is not an error.
   */
  delete(key: string): Promise<void>;
}

export type ListAllResult = {
  keys: string[];
  commonPrefixes: string[];
};

/**
 * Follow continuation tokens until the listing is exhausted and merge every page.
 */
export async function listAll(store: ObjectStore, prefix: string, delimiter?: string): Promise<ListAllResult> {
  const keys: string[] = [];
  const commonPrefixes: string[] = [];
  let continuationToken: string | undefined;

  do {
    const page = await store.list(prefix, { delimiter, continuationToken });
    keys.push(...page.keys);
    commonPrefixes.push(...page.commonPrefixes);
    continuationToken = page.nextToken;
  } while (continuationToken);

  return {
    keys: Array.from(new Set(keys)).sort(),
    commonPrefixes: Array.from(new Set(commonPrefixes)).sort(),
  };
}

export function decodeBody(body: Uint8Array): string {
  return Buffer.from(body.buffer, body.byteOffset, body.byteLength).toString('utf8');
}
