import { describe, it, expect } from 'vitest';
import { detectBlogStoreMode } from '@/lib/blog-store-mode';
import { loadBlogConfig } from '@/server/blog/config';

describe('detectBlogStoreMode', () => {
  it('prefers an explicit mode and otherwise follows the bucket', () => {
    expect(detectBlogStoreMode({})).toBe('mock');
    expect(detectBlogStoreMode({ BLOG_BUCKET: 'posts-bucket' })).toBe('s3');
    expect(detectBlogStoreMode({ BLOG_BUCKET: 'posts-bucket', BLOG_STORE_MODE: ' Mock ' })).toBe('mock');
    expect(detectBlogStoreMode({ BLOG_STORE_MODE: 'dynamo' })).toBe('mock');
  });
});

describe('loadBlogConfig', () => {
  it('falls back to in-memory defaults', () => {
    expect(loadBlogConfig({})).toEqual({
      mode: 'mock',
      region: 'us-east-1',
      bucket: 'mock-blog-bucket',
      keyPrefix: '',
      endpoint: undefined,
      forcePathStyle: false,
      repairLabelsOnRead: false,
    });
  });

  it('reads the S3 settings', () => {
    const config = loadBlogConfig({
      AWS_REGION: 'eu-west-1',
      BLOG_BUCKET: ' posts-bucket ',
      BLOG_KEY_PREFIX: '/blog/',
      BLOG_S3_ENDPOINT: 'http://localhost:9000',
      BLOG_S3_FORCE_PATH_STYLE: 'true',
      BLOG_REPAIR_LABELS_ON_READ: 'yes',
    });

    expect(config).toEqual({
      mode: 's3',
      region: 'eu-west-1',
      bucket: 'posts-bucket',
      keyPrefix: 'blog/',
      endpoint: 'http://localhost:9000',
      forcePathStyle: true,
      repairLabelsOnRead: true,
    });
  });

  it('requires a bucket in s3 mode', () => {
    expect(() => loadBlogConfig({ BLOG_STORE_MODE: 's3' })).toThrow('Missing required env var BLOG_BUCKET');
  });
});
