import { detectBlogStoreMode, type BlogStoreMode } from '@/lib/blog-store-mode';

export type BlogConfig = {
  mode: BlogStoreMode;
  region: string;
  bucket: string;
  keyPrefix: string;
  endpoint?: string;
  forcePathStyle: boolean;
  repairLabelsOnRead: boolean;
};

function requiredEnv(value: string | undefined, name: string): string {
  if (!value?.trim()) {
    throw new Error(`Missing required env var ${name}`);
  }
  return value.trim();
}

function resolveEnv(mode: BlogStoreMode, value: string | undefined, name: string, mockFallback: string): string {
  if (mode === 'mock') {
    return value?.trim() ? value.trim() : mockFallback;
  }
  return requiredEnv(value, name);
}

function flag(value: string | undefined): boolean {
  const normalized = value?.trim().toLowerCase();
  return normalized === 'true' || normalized === '1' || normalized === 'yes';
}

function normalizePrefix(value: string | undefined): string {
  const trimmed = value?.trim().replace(/^\/+/, '').replace(/\/+$/, '') ?? '';
  return trimmed ? `${trimmed}/` : '';
}

export function loadBlogConfig(env: NodeJS.ProcessEnv = process.env): BlogConfig {
  const mode = detectBlogStoreMode(env);
  return {
    mode,
    region: env.AWS_REGION ?? 'us-east-1',
    bucket: resolveEnv(mode, env.BLOG_BUCKET, 'BLOG_BUCKET', 'mock-blog-bucket'),
    keyPrefix: normalizePrefix(env.BLOG_KEY_PREFIX),
    endpoint: env.BLOG_S3_ENDPOINT?.trim() || undefined,
    forcePathStyle: flag(env.BLOG_S3_FORCE_PATH_STYLE),
    repairLabelsOnRead: flag(env.BLOG_REPAIR_LABELS_ON_READ),
  };
}

let cachedConfig: BlogConfig | undefined;

export function getBlogConfig(): BlogConfig {
  if (!cachedConfig) {
    cachedConfig = loadBlogConfig();
  }
  return cachedConfig;
}
