export type BlogStoreMode = 'mock' | 's3';

const normalizeMode = (value?: string | null) => value?.trim().toLowerCase() || undefined;

export function detectBlogStoreMode(env: NodeJS.ProcessEnv = process.env): BlogStoreMode {
  const explicit = normalizeMode(env.BLOG_STORE_MODE);
  if (explicit === 'mock' || explicit === 's3') {
    return explicit;
  }

  return env.BLOG_BUCKET?.trim() ? 's3' : 'mock';
}
