import { S3Client } from '@aws-sdk/client-s3';
import { getBlogConfig } from '@/server/blog/config';
import { MemoryObjectStore } from '@/server/blog/memory-object-store';
import type { ObjectStore } from '@/server/blog/object-store';
import { S3ObjectStore } from '@/server/blog/s3-object-store';
import { createPostRepository, type PostRepository } from '@/server/blog/store';

let s3Client: S3Client | undefined;
let objectStore: ObjectStore | undefined;
let postRepository: PostRepository | undefined;

export function getS3Client(): S3Client {
  if (!s3Client) {
    const config = getBlogConfig();
    s3Client = new S3Client({
      region: config.region,
      ...(config.endpoint ? { endpoint: config.endpoint } : {}),
      forcePathStyle: config.forcePathStyle,
    });
  }
  return s3Client;
}

export function getObjectStore(): ObjectStore {
  if (!objectStore) {
    const config = getBlogConfig();
    if (config.mode === 'mock') {
      console.info('[blog-store] BLOG_STORE_MODE=mock; keeping posts in memory');
      objectStore = new MemoryObjectStore();
    } else {
      objectStore = new S3ObjectStore({
        client: getS3Client(),
        bucket: config.bucket,
        keyPrefix: config.keyPrefix,
      });
    }
  }
  return objectStore;
}

export function getPostRepository(): PostRepository {
  if (!postRepository) {
    postRepository = createPostRepository({
      store: getObjectStore(),
      repairLabelsOnRead: getBlogConfig().repairLabelsOnRead,
    });
  }
  return postRepository;
}
