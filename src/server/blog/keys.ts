/**
 * Object key layout for the blog bucket:
 *
 *   posts/{slug}/props/{encoded props}
 *   posts/{slug}/content/raw
 *   posts/{slug}/labels/{label}/true
 *   labels/{label}/{slug}
 *   images/{imageId}/original | 1000 | 150
 *
 * Every listing goes through prefixes and the `/` delimiter, so these strings
 * must not change shape.
 */
import { IMAGE_VARIANTS, type ImageVariant } from '@/types/blog';
import { KeyDecodeError } from '@/server/blog/errors';
import { assertImageId, assertLabel, assertSlug, isValidImageId, isValidLabel, isValidSlug } from '@/server/blog/validators';

export const DELIMITER = '/';
export const POSTS_ROOT = 'posts/';
export const LABELS_ROOT = 'labels/';
export const IMAGES_ROOT = 'images/';
export const CONTENT_LEAF = 'raw';
export const FORWARD_LABEL_LEAF = 'true';
export const MAX_KEY_BYTES = 1024;

export { IMAGE_VARIANTS };
export type { ImageVariant };

export type KeyDescriptor =
  | { kind: 'props'; slug: string; encodedProps: string }
  | { kind: 'content'; slug: string }
  | { kind: 'forward-label'; slug: string; label: string }
  | { kind: 'reverse-label'; label: string; slug: string }
  | { kind: 'image'; imageId: string; variant: ImageVariant };

export type KeyParts = KeyDescriptor;

export function postPrefix(slug: string): string {
  return `${POSTS_ROOT}${assertSlug(slug)}/`;
}

export function propsPrefix(slug: string): string {
  return `${postPrefix(slug)}props/`;
}

export function postLabelsPrefix(slug: string): string {
  return `${postPrefix(slug)}labels/`;
}

export function labelPrefix(label: string): string {
  return `${LABELS_ROOT}${assertLabel(label)}/`;
}

export function imagePrefix(imageId: string): string {
  return `${IMAGES_ROOT}${assertImageId(imageId)}/`;
}

export function buildKey(descriptor: KeyDescriptor): string {
  switch (descriptor.kind) {
    case 'props':
      return `${propsPrefix(descriptor.slug)}${descriptor.encodedProps}`;
    case 'content':
      return `${postPrefix(descriptor.slug)}content/${CONTENT_LEAF}`;
    case 'forward-label':
      return `${postLabelsPrefix(descriptor.slug)}${assertLabel(descriptor.label)}/${FORWARD_LABEL_LEAF}`;
    case 'reverse-label':
      return `${labelPrefix(descriptor.label)}${assertSlug(descriptor.slug)}`;
    case 'image':
      return `${imagePrefix(descriptor.imageId)}${descriptor.variant}`;
  }
}

function isImageVariant(value: string): value is ImageVariant {
  return (IMAGE_VARIANTS as readonly string[]).includes(value);
}

function parsePostKey(key: string, parts: string[]): KeyParts {
  const [, slug, section, ...rest] = parts;
  if (!slug || !isValidSlug(slug)) {
    throw new KeyDecodeError(key, 'invalid slug segment');
  }

  if (section === 'props' && rest.length === 1 && rest[0]) {
    return { kind: 'props', slug, encodedProps: rest[0] };
  }
  if (section === 'content' && rest.length === 1 && rest[0] === CONTENT_LEAF) {
    return { kind: 'content', slug };
  }
  if (section === 'labels' && rest.length === 2 && rest[1] === FORWARD_LABEL_LEAF) {
    const label = rest[0];
    if (label && isValidLabel(label)) {
      return { kind: 'forward-label', slug, label };
    }
    throw new KeyDecodeError(key, 'invalid label segment');
  }
  throw new KeyDecodeError(key, 'unknown post key section');
}

/**
 * Classify an object key. Throws KeyDecodeError for anything outside the
 * layout; listing code treats that as "skip and log".
 */
export function parseKey(key: string): KeyParts {
  const parts = key.split(DELIMITER);

  switch (parts[0]) {
    case 'posts':
      return parsePostKey(key, parts);
    case 'labels': {
      const [, label, slug] = parts;
      if (parts.length !== 3 || !label || !slug || !isValidLabel(label) || !isValidSlug(slug)) {
        throw new KeyDecodeError(key, 'reverse label keys look like labels/{label}/{slug}');
      }
      return { kind: 'reverse-label', label, slug };
    }
    case 'images': {
      const [, imageId, variant] = parts;
      if (parts.length !== 3 || !imageId || !variant || !isValidImageId(imageId) || !isImageVariant(variant)) {
        throw new KeyDecodeError(key, 'image keys look like images/{id}/{original|1000|150}');
      }
      return { kind: 'image', imageId, variant };
    }
    default:
      throw new KeyDecodeError(key, 'unknown root prefix');
  }
}

export function tryParseKey(key: string): KeyParts | null {
  try {
    return parseKey(key);
  } catch (error) {
    if (error instanceof KeyDecodeError) {
      return null;
    }
    throw error;
  }
}

/**
 * Turn a common prefix such as `posts/my-post/` into its single child segment.
 */
export function childSegment(prefix: string, commonPrefix: string): string | null {
  if (!commonPrefix.startsWith(prefix)) {
    return null;
  }
  const segment = commonPrefix.slice(prefix.length).replace(/\/$/, '');
  return segment && !segment.includes(DELIMITER) ? segment : null;
}

export function keyByteLength(key: string): number {
  return Buffer.byteLength(key, 'utf8');
}
