import type {
  Post,
  PostListing,
  PostProps,
  PostSummary,
  RepositoryWarning,
  SaveChanges,
  SaveResult,
} from '@/types/blog';
import {
  ImageNotFoundError,
  PartialWriteError,
  PostAlreadyExistsError,
  PostInconsistentError,
  PostNotFoundError,
  PropsDecodeError,
  type DeleteStep,
  type SaveStep,
} from '@/server/blog/errors';
import {
  buildKey,
  childSegment,
  imagePrefix,
  IMAGES_ROOT,
  LABELS_ROOT,
  postPrefix,
  POSTS_ROOT,
  tryParseKey,
  type ImageVariant,
} from '@/server/blog/keys';
import { createLabelIndex, type LabelIndex } from '@/server/blog/labels';
import { createLinkChecker, type LinkChecker } from '@/server/blog/links';
import { decodeBody, listAll, type ObjectStore } from '@/server/blog/object-store';
import { buildPropsKey, tryDecodeProps } from '@/server/blog/props-codec';
import { assertSlug, isValidSlug, parseOrThrow, savePostSchema } from '@/server/blog/validators';

const LOG_PREFIX = '[blog-store]';
const READINESS_PREFIX = '.readyz/';

export type SaveOptions = {
  /**
   * Validate and check links without writing anything.
   */
  dryRun?: boolean;
};

export interface PostRepository {
  listPosts(): Promise<PostListing>;
  getPost(slug: string): Promise<Post>;
  savePost(post: Post, options?: SaveOptions): Promise<SaveResult>;
  /**
   * Save a post whose slug has no props key yet; throws PostAlreadyExistsError otherwise.
   */
  createPost(post: Post, options?: SaveOptions): Promise<SaveResult>;
  deletePost(slug: string): Promise<void>;
  publish(slug: string): Promise<SaveResult>;
  unpublish(slug: string): Promise<SaveResult>;
  listByLabel(label: string): Promise<string[]>;
  /**
   * Summaries of the posts carrying `label`, read only for the slugs the
   * reverse index names.
   */
  listPostsByLabel(label: string): Promise<PostListing>;
  listImages(): Promise<string[]>;
  imageExists(imageId: string): Promise<boolean>;
  getImage(imageId: string, variant?: ImageVariant): Promise<Uint8Array>;
  /**
   * Delete every variant stored under the image id.
   */
  deleteImage(imageId: string): Promise<void>;
  /**
   * Every key in the bucket, sorted. Used by admin tooling.
   */
  listObjects(): Promise<string[]>;
  checkReady(): Promise<void>;
}

export type PostRepositoryOptions = {
  store: ObjectStore;
  labels?: LabelIndex;
  links?: LinkChecker;
  repairLabelsOnRead?: boolean;
};

type PropsKeyEntry = {
  key: string;
  encoded: string;
};

type PostKeySet = {
  keys: string[];
  propsKeys: PropsKeyEntry[];
  hasContent: boolean;
  labels: string[];
};

type ResolvedProps = {
  props?: PostProps;
  corrupt: { key: string; error: PropsDecodeError }[];
};

function classifyPostKeys(slug: string, keys: string[]): PostKeySet {
  const keySet: PostKeySet = { keys, propsKeys: [], hasContent: false, labels: [] };
  const labels = new Set<string>();

  for (const key of keys) {
    const parts = tryParseKey(key);
    if (!parts || !('slug' in parts) || parts.slug !== slug) {
      console.warn(`${LOG_PREFIX} Ignoring unrecognised key ${key}`);
      continue;
    }
    switch (parts.kind) {
      case 'props':
        keySet.propsKeys.push({ key, encoded: parts.encodedProps });
        break;
      case 'content':
        keySet.hasContent = true;
        break;
      case 'forward-label':
        labels.add(parts.label);
        break;
      default:
        break;
    }
  }

  keySet.labels = Array.from(labels).sort();
  return keySet;
}

/**
 * Pick the live props among however many props keys a post has. Concurrent
 * saves can leave more than one; the latest embedded date wins, then the
 * lexically greatest key.
 */
function resolveProps(propsKeys: PropsKeyEntry[]): ResolvedProps {
  const valid: { key: string; props: PostProps }[] = [];
  const corrupt: ResolvedProps['corrupt'] = [];

  for (const entry of propsKeys) {
    const decoded = tryDecodeProps(entry.encoded);
    if (decoded instanceof PropsDecodeError) {
      corrupt.push({ key: entry.key, error: decoded });
    } else {
      valid.push({ key: entry.key, props: decoded });
    }
  }

  valid.sort((a, b) => {
    if (a.props.date !== b.props.date) {
      return a.props.date < b.props.date ? 1 : -1;
    }
    return a.key < b.key ? 1 : a.key > b.key ? -1 : 0;
  });

  const winner = valid[0];
  return { props: winner?.props, corrupt };
}

function compareSummaries(a: PostSummary, b: PostSummary): number {
  if (a.date !== b.date) {
    return a.date < b.date ? 1 : -1;
  }
  return a.slug < b.slug ? -1 : a.slug > b.slug ? 1 : 0;
}

function toProps(post: Pick<Post, keyof PostProps>): PostProps {
  const props: PostProps = {
    date: post.date,
    title: post.title,
    contentType: post.contentType,
    published: post.published,
    imageIds: [...post.imageIds],
  };
  if (post.bskyPostUrl !== undefined) {
    props.bskyPostUrl = post.bskyPostUrl;
  }
  return props;
}

function difference(left: string[], right: string[]): string[] {
  const exclude = new Set(right);
  return left.filter((value) => !exclude.has(value));
}

type Write = () => Promise<void>;

/**
 * Runs the steps of a multi-key mutation, one write at a time. Once any write
 * has landed, a later failure is reported as a PartialWriteError naming the
 * step it belongs to.
 */
function createStepRunner<Step extends SaveStep | DeleteStep>(operation: 'save' | 'delete', slug: string) {
  let applied = false;
  return async (step: Step, writes: Write[]) => {
    for (const write of writes) {
      try {
        await write();
      } catch (error) {
        if (applied) {
          console.error(`${LOG_PREFIX} ${operation} of ${slug} stopped at step ${step}`, error);
          throw new PartialWriteError(operation, slug, step, error);
        }
        throw error;
      }
      applied = true;
    }
  };
}

export function createPostRepository(options: PostRepositoryOptions): PostRepository {
  const { store } = options;
  const labels = options.labels ?? createLabelIndex(store, { repairOnRead: options.repairLabelsOnRead });
  const links = options.links ?? createLinkChecker(store);

  async function readPostKeys(slug: string): Promise<PostKeySet> {
    const { keys } = await listAll(store, postPrefix(slug));
    return classifyPostKeys(slug, keys);
  }

  async function findReverseMarkers(slug: string): Promise<string[]> {
    const { keys } = await listAll(store, LABELS_ROOT);
    return keys.filter((key) => {
      const parts = tryParseKey(key);
      return parts?.kind === 'reverse-label' && parts.slug === slug;
    });
  }

  function deletions(keys: string[]): Write[] {
    return keys.map((key) => () => store.delete(key));
  }

  async function summarize(slug: string, warnings: RepositoryWarning[]): Promise<PostSummary | null> {
    const keySet = await readPostKeys(slug);
    const resolved = resolveProps(keySet.propsKeys);

    for (const { key, error } of resolved.corrupt) {
      warnings.push({ slug, kind: 'corrupt-props', key, message: error.message });
    }
    if (!resolved.props) {
      if (keySet.propsKeys.length === 0 && keySet.keys.length > 0) {
        warnings.push({ slug, kind: 'missing-props', message: `Post "${slug}" has no props key` });
      }
      return null;
    }
    return { slug, ...resolved.props, labels: keySet.labels };
  }

  async function collectSummaries(slugs: string[], warnings: RepositoryWarning[]): Promise<PostListing> {
    const summaries = await Promise.all(slugs.map((slug) => summarize(slug, warnings)));
    for (const warning of warnings) {
      console.warn(`${LOG_PREFIX} Skipped ${warning.slug}: ${warning.message}`);
    }
    return {
      posts: summaries.filter((summary): summary is PostSummary => summary !== null).sort(compareSummaries),
      warnings,
    };
  }

  async function savePost(post: Post, saveOptions: SaveOptions = {}): Promise<SaveResult> {
    const parsed = parseOrThrow(savePostSchema, post, 'post');
    const slug = parsed.slug;
    const nextLabels = Array.from(new Set(parsed.labels)).sort();
    const propsKey = buildPropsKey(slug, toProps(parsed));

    const brokenLinks = await links.checkLinks({
      content: parsed.content,
      contentType: parsed.contentType,
      imageIds: parsed.imageIds,
    });

    const existing = await readPostKeys(slug);
    const stalePropsKeys = existing.propsKeys.map((entry) => entry.key).filter((key) => key !== propsKey);
    const propsWritten = !existing.propsKeys.some((entry) => entry.key === propsKey);
    const changes: SaveChanges = {
      contentWritten: true,
      propsWritten,
      labelsAdded: difference(nextLabels, existing.labels),
      labelsRemoved: difference(existing.labels, nextLabels),
      propsKeysDeleted: stalePropsKeys,
    };

    if (saveOptions.dryRun) {
      return { slug, propsKey, written: false, brokenLinks, changes };
    }

    if (brokenLinks.length > 0) {
      console.warn(`${LOG_PREFIX} Saving ${slug} with ${brokenLinks.length} broken references`);
    }

    const run = createStepRunner<SaveStep>('save', slug);
    await run('content', [() => store.put(buildKey({ kind: 'content', slug }), parsed.content)]);
    await run('props', propsWritten ? [() => store.put(propsKey, new Uint8Array())] : []);
    await run('label-add', changes.labelsAdded.map((label) => () => labels.addMarkers(slug, [label])));
    await run('label-remove', changes.labelsRemoved.map((label) => () => labels.removeMarkers(slug, [label])));
    await run('props-cleanup', deletions(stalePropsKeys));

    return { slug, propsKey, written: true, brokenLinks, changes };
  }

  async function setPublished(slug: string, published: boolean): Promise<SaveResult> {
    const post = await getPost(slug);
    return savePost({ ...post, published });
  }

  async function createPost(post: Post, saveOptions: SaveOptions = {}): Promise<SaveResult> {
    const existing = await readPostKeys(assertSlug(post.slug));
    if (existing.propsKeys.length > 0) {
      throw new PostAlreadyExistsError(post.slug);
    }
    return savePost(post, saveOptions);
  }

  async function getPost(slug: string): Promise<Post> {
    const keySet = await readPostKeys(assertSlug(slug));
    if (keySet.propsKeys.length === 0) {
      if (keySet.keys.length > 0) {
        console.warn(`${LOG_PREFIX} ${slug} has ${keySet.keys.length} keys but no props key; treating as deleted`);
      }
      throw new PostNotFoundError(slug);
    }

    const resolved = resolveProps(keySet.propsKeys);
    for (const { key, error } of resolved.corrupt) {
      console.warn(`${LOG_PREFIX} Skipping corrupt props key ${key}: ${error.message}`);
    }
    if (!resolved.props) {
      const first = resolved.corrupt[0];
      throw first ? first.error : new PostNotFoundError(slug);
    }
    if (!keySet.hasContent) {
      throw new PostInconsistentError(slug, 'props exist but content is missing');
    }

    const body = await store.get(buildKey({ kind: 'content', slug }));
    if (body === null) {
      throw new PostInconsistentError(slug, 'content disappeared between list and fetch');
    }

    if (labels.repairOnRead && keySet.labels.length > 0) {
      await labels.repairReverseMarkers(slug, keySet.labels);
    }

    return { slug, ...resolved.props, labels: keySet.labels, content: decodeBody(body) };
  }

  return {
    async listPosts() {
      const { commonPrefixes } = await listAll(store, POSTS_ROOT, '/');
      const slugs: string[] = [];
      const warnings: RepositoryWarning[] = [];
      for (const prefix of commonPrefixes) {
        const slug = childSegment(POSTS_ROOT, prefix);
        if (slug && isValidSlug(slug)) {
          slugs.push(slug);
        } else {
          warnings.push({
            slug: slug ?? prefix,
            kind: 'invalid-slug',
            key: prefix,
            message: `Prefix "${prefix}" does not name a valid post slug`,
          });
        }
      }

      return collectSummaries(slugs, warnings);
    },

    getPost,
    savePost,
    createPost,

    async deletePost(slug) {
      const keySet = await readPostKeys(assertSlug(slug));
      const reverseMarkers = await findReverseMarkers(slug);
      if (keySet.keys.length === 0 && reverseMarkers.length === 0) {
        throw new PostNotFoundError(slug);
      }

      const propsKeys = keySet.propsKeys.map((entry) => entry.key);
      const contentKey = buildKey({ kind: 'content', slug });
      // Forward label markers, then content.
      const remaining = [
        ...difference(keySet.keys, [...propsKeys, contentKey]),
        ...(keySet.keys.includes(contentKey) ? [contentKey] : []),
      ];

      const run = createStepRunner<DeleteStep>('delete', slug);
      await run('props', deletions(propsKeys));
      await run('post-keys', deletions(remaining));
      await run('reverse-labels', deletions(reverseMarkers));
      console.info(`${LOG_PREFIX} Deleted ${slug} (${keySet.keys.length + reverseMarkers.length} keys)`);
    },

    publish(slug) {
      return setPublished(slug, true);
    },

    unpublish(slug) {
      return setPublished(slug, false);
    },

    listByLabel(label) {
      return labels.listByLabel(label);
    },

    async listPostsByLabel(label) {
      const slugs = await labels.listByLabel(label);
      const listing = await collectSummaries(slugs, []);
      // A reverse marker whose forward marker is gone is a label being removed.
      return { ...listing, posts: listing.posts.filter((post) => post.labels.includes(label)) };
    },

    async listImages() {
      const { keys } = await listAll(store, IMAGES_ROOT);
      const ids = new Set<string>();
      for (const key of keys) {
        const parts = tryParseKey(key);
        if (parts?.kind === 'image' && parts.variant === 'original') {
          ids.add(parts.imageId);
        }
      }
      return Array.from(ids).sort();
    },

    async imageExists(imageId) {
      const key = buildKey({ kind: 'image', imageId, variant: 'original' });
      const { keys } = await listAll(store, key);
      return keys.includes(key);
    },

    async getImage(imageId, variant = 'original') {
      const body = await store.get(buildKey({ kind: 'image', imageId, variant }));
      if (body === null) {
        throw new ImageNotFoundError(imageId, variant);
      }
      return body;
    },

    async deleteImage(imageId) {
      const { keys } = await listAll(store, imagePrefix(imageId));
      if (keys.length === 0) {
        throw new ImageNotFoundError(imageId);
      }
      for (const key of keys) {
        await store.delete(key);
      }
      console.info(`${LOG_PREFIX} Deleted image ${imageId} (${keys.length} keys)`);
    },

    async listObjects() {
      const { keys } = await listAll(store, '');
      return keys;
    },

    async checkReady() {
      await store.list(READINESS_PREFIX, { delimiter: '/' });
    },
  };
}
