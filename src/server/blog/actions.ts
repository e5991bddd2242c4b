import type { BrokenLink, Post, PostSummary, SaveResult } from '@/types/blog';
import { BlogValidationError, type ValidationIssue } from '@/server/blog/errors';
import type { PostRepository } from '@/server/blog/store';
import {
  imageInputSchema,
  labelInputSchema,
  parseOrThrow,
  postInputSchema,
  slugInputSchema,
  type ImageInput,
  type LabelInput,
  type ParsedSavePostInput,
  type SavePostInput,
  type SlugInput,
} from '@/server/blog/validators';

export type CheckPostResult = {
  ok: boolean;
  issues: ValidationIssue[];
  result?: SaveResult;
};

export type SavePostResponse = {
  result: SaveResult;
  warnings: BrokenLink[];
};

export type AdminPostFilters = {
  published?: boolean;
  search?: string;
};

function describeBrokenLink(link: BrokenLink): string {
  switch (link.reason) {
    case 'missing-image':
      return `Image "${link.reference}" does not exist`;
    case 'missing-post':
      return `Link "${link.reference}" points at a post that does not exist`;
    case 'invalid-reference':
      return `Reference "${link.reference}" is not a valid image or post path`;
  }
}

function toPost(payload: ParsedSavePostInput): Post {
  return {
    slug: payload.slug,
    date: payload.date,
    title: payload.title,
    contentType: payload.contentType,
    published: payload.published,
    imageIds: payload.imageIds,
    labels: payload.labels,
    content: payload.content,
    ...(payload.bskyPostUrl !== undefined ? { bskyPostUrl: payload.bskyPostUrl } : {}),
  };
}

function matchesFilters(post: PostSummary, filters: AdminPostFilters): boolean {
  if (filters.published !== undefined && post.published !== filters.published) {
    return false;
  }
  const search = filters.search?.toLowerCase().trim();
  if (search) {
    return post.title.toLowerCase().includes(search) || post.slug.toLowerCase().includes(search);
  }
  return true;
}

/**
 * Editor-facing operations. Input arrives untrusted from the HTTP layer and is
 * parsed here before it reaches the repository.
 */
export function createBlogActions(repository: PostRepository) {
  return {
    /**
     * Dry-run save. Broken links block, so they come back as issues.
     */
    async checkPost(input: SavePostInput): Promise<CheckPostResult> {
      try {
        const payload = parseOrThrow(postInputSchema, input, 'post');
        const result = await repository.savePost(toPost(payload), { dryRun: true });
        const issues = result.brokenLinks.map((link) => ({ path: 'content', message: describeBrokenLink(link) }));
        return { ok: issues.length === 0, issues, result };
      } catch (error) {
        if (error instanceof BlogValidationError) {
          return { ok: false, issues: error.issues.length ? error.issues : [{ path: '', message: error.message }] };
        }
        throw error;
      }
    },

    /**
     * Save and report broken links as advisory warnings.
     */
    async savePost(input: SavePostInput): Promise<SavePostResponse> {
      const payload = parseOrThrow(postInputSchema, input, 'post');
      const result = await repository.savePost(toPost(payload));
      return { result, warnings: result.brokenLinks };
    },

    /**
     * Save a new post. Fails with PostAlreadyExistsError when the slug is taken.
     */
    async createPost(input: SavePostInput): Promise<SavePostResponse> {
      const payload = parseOrThrow(postInputSchema, input, 'post');
      const result = await repository.createPost(toPost(payload));
      return { result, warnings: result.brokenLinks };
    },

    async publishPost(input: SlugInput): Promise<SaveResult> {
      const payload = parseOrThrow(slugInputSchema, input, 'publish request');
      return repository.publish(payload.slug);
    },

    async unpublishPost(input: SlugInput): Promise<SaveResult> {
      const payload = parseOrThrow(slugInputSchema, input, 'unpublish request');
      return repository.unpublish(payload.slug);
    },

    async deletePost(input: SlugInput): Promise<void> {
      const payload = parseOrThrow(slugInputSchema, input, 'delete request');
      await repository.deletePost(payload.slug);
    },

    async listPostsByLabel(input: LabelInput): Promise<PostSummary[]> {
      const payload = parseOrThrow(labelInputSchema, input, 'label');
      const listing = await repository.listPostsByLabel(payload.label);
      return listing.posts;
    },

    async listAdminPosts(filters: AdminPostFilters = {}): Promise<PostSummary[]> {
      const listing = await repository.listPosts();
      return listing.posts.filter((post) => matchesFilters(post, filters));
    },

    async getAdminPost(input: SlugInput): Promise<Post> {
      const payload = parseOrThrow(slugInputSchema, input, 'slug');
      return repository.getPost(payload.slug);
    },

    async getImage(input: ImageInput): Promise<Uint8Array> {
      const payload = parseOrThrow(imageInputSchema, input, 'image request');
      return repository.getImage(payload.imageId, payload.variant);
    },

    async deleteImage(input: Pick<ImageInput, 'imageId'>): Promise<void> {
      const payload = parseOrThrow(imageInputSchema, input, 'image request');
      await repository.deleteImage(payload.imageId);
    },

    listImages(): Promise<string[]> {
      return repository.listImages();
    },

    listObjects(): Promise<string[]> {
      return repository.listObjects();
    },
  };
}

export type BlogActions = ReturnType<typeof createBlogActions>;
