import { z } from 'zod';
import type { PostProps } from '@/types/blog';
import { BlogValidationError, PropsDecodeError } from '@/server/blog/errors';
import { buildKey, keyByteLength, MAX_KEY_BYTES } from '@/server/blog/keys';
import { parseOrThrow, postPropsSchema } from '@/server/blog/validators';

export const PROPS_FORMAT_VERSION = 1;

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;

// Wire shape of format version 1. Field order here is the serialization order.
const wirePropsSchema = z
  .object({
    v: z.literal(PROPS_FORMAT_VERSION),
    date: z.string(),
    title: z.string(),
    type: z.string(),
    published: z.boolean(),
    images: z.array(z.string()),
    bsky: z.string().optional(),
  })
  .strict();

type WireProps = z.infer<typeof wirePropsSchema>;

function toWire(props: PostProps): WireProps {
  const wire: WireProps = {
    v: PROPS_FORMAT_VERSION,
    date: props.date,
    title: props.title,
    type: props.contentType,
    published: props.published,
    images: [...props.imageIds],
  };
  if (props.bskyPostUrl !== undefined) {
    wire.bsky = props.bskyPostUrl;
  }
  return wire;
}

function serialize(props: PostProps): string {
  return Buffer.from(JSON.stringify(toWire(props)), 'utf8').toString('base64url');
}

/**
 * Encode post props into the trailing segment of a props key. Equal props
 * always encode to the same string, so an unchanged save maps onto the
 * existing key.
 */
export function encodeProps(props: PostProps): string {
  return serialize(parseOrThrow(postPropsSchema, props, 'post props'));
}

/**
 * Decode the trailing segment of a props key. Any structural problem raises
 * PropsDecodeError; nothing else escapes.
 */
export function decodeProps(encoded: string): PostProps {
  if (!encoded || !BASE64URL_PATTERN.test(encoded) || encoded.length % 4 === 1) {
    throw new PropsDecodeError(encoded, 'not a base64url string');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(encoded, 'base64url').toString('utf8'));
  } catch (error) {
    throw new PropsDecodeError(encoded, 'payload is not JSON', { cause: error });
  }

  const wire = wirePropsSchema.safeParse(raw);
  if (!wire.success) {
    throw new PropsDecodeError(encoded, `unexpected payload shape (${wire.error.issues[0]?.message ?? 'unknown'})`);
  }

  const props = postPropsSchema.safeParse({
    date: wire.data.date,
    title: wire.data.title,
    contentType: wire.data.type,
    published: wire.data.published,
    imageIds: wire.data.images,
    ...(wire.data.bsky !== undefined ? { bskyPostUrl: wire.data.bsky } : {}),
  });
  if (!props.success) {
    throw new PropsDecodeError(encoded, `invalid field values (${props.error.issues[0]?.message ?? 'unknown'})`);
  }

  // Only the canonical encoding is accepted, so one set of props has exactly one key.
  if (serialize(props.data) !== encoded) {
    throw new PropsDecodeError(encoded, 'non-canonical encoding');
  }
  return props.data;
}

export function tryDecodeProps(encoded: string): PostProps | PropsDecodeError {
  try {
    return decodeProps(encoded);
  } catch (error) {
    if (error instanceof PropsDecodeError) {
      return error;
    }
    throw error;
  }
}

export function buildPropsKey(slug: string, props: PostProps): string {
  const key = buildKey({ kind: 'props', slug, encodedProps: encodeProps(props) });
  if (keyByteLength(key) > MAX_KEY_BYTES) {
    throw new BlogValidationError(`Props for post "${slug}" do not fit in an object key (${MAX_KEY_BYTES} bytes max)`, [
      { path: 'title', message: 'Shorten the title or reduce the number of images' },
    ]);
  }
  return key;
}
