export type * from '@/types/blog';
export { CONTENT_TYPES, IMAGE_VARIANTS } from '@/types/blog';
export * from '@/server/blog/errors';
export { buildKey, parseKey, tryParseKey } from '@/server/blog/keys';
export type { KeyDescriptor, KeyParts } from '@/server/blog/keys';
export { encodeProps, decodeProps, buildPropsKey, PROPS_FORMAT_VERSION } from '@/server/blog/props-codec';
export { listAll } from '@/server/blog/object-store';
export type { ObjectStore, ListOptions, ListPage, ObjectBody } from '@/server/blog/object-store';
export { MemoryObjectStore } from '@/server/blog/memory-object-store';
export { S3ObjectStore } from '@/server/blog/s3-object-store';
export type { S3ObjectStoreOptions } from '@/server/blog/s3-object-store';
export { createLabelIndex } from '@/server/blog/labels';
export type { LabelIndex, LabelIndexOptions } from '@/server/blog/labels';
export { createLinkChecker, extractReferences } from '@/server/blog/links';
export type { ContentReference, LinkChecker, LinkCheckInput } from '@/server/blog/links';
export { createPostRepository } from '@/server/blog/store';
export type { PostRepository, PostRepositoryOptions, SaveOptions } from '@/server/blog/store';
export { createBlogActions } from '@/server/blog/actions';
export type { AdminPostFilters, BlogActions, CheckPostResult, SavePostResponse } from '@/server/blog/actions';
export { getObjectStore, getPostRepository, getS3Client } from '@/server/blog/clients';
export { getBlogConfig, loadBlogConfig } from '@/server/blog/config';
export type { BlogConfig } from '@/server/blog/config';
