export const CONTENT_TYPES = ['markdown', 'restructured-text'] as const;

export type ContentType = (typeof CONTENT_TYPES)[number];

export const IMAGE_VARIANTS = ['original', '1000', '150'] as const;

export type ImageVariant = (typeof IMAGE_VARIANTS)[number];

/**
 * Everything about a post that is embedded in its props key. Changing any of
 * these fields produces a new props key.
 */
export interface PostProps {
  date: string;
  title: string;
  contentType: ContentType;
  published: boolean;
  imageIds: string[];
  bskyPostUrl?: string;
}

export interface PostSummary extends PostProps {
  slug: string;
  labels: string[];
}

export interface Post extends PostSummary {
  content: string;
}

export type BrokenLinkReason = 'missing-image' | 'missing-post' | 'invalid-reference';

export interface BrokenLink {
  reference: string;
  reason: BrokenLinkReason;
}

export type RepositoryWarningKind = 'missing-props' | 'corrupt-props' | 'invalid-slug';

export interface RepositoryWarning {
  slug: string;
  kind: RepositoryWarningKind;
  key?: string;
  message: string;
}

export interface PostListing {
  posts: PostSummary[];
  warnings: RepositoryWarning[];
}

export interface SaveChanges {
  contentWritten: boolean;
  propsWritten: boolean;
  labelsAdded: string[];
  labelsRemoved: string[];
  propsKeysDeleted: string[];
}

export interface SaveResult {
  slug: string;
  propsKey: string;
  written: boolean;
  brokenLinks: BrokenLink[];
  changes: SaveChanges;
}
