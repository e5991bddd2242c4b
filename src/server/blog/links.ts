import type { BrokenLink, ContentType } from '@/types/blog';
import { buildKey, IMAGE_VARIANTS, propsPrefix } from '@/server/blog/keys';
import { listAll, type ObjectStore } from '@/server/blog/object-store';
import { isValidImageId, isValidSlug } from '@/server/blog/validators';

const LOG_PREFIX = '[blog-links]';

const MARKDOWN_LINK = /!?\[[^\]]*\]\(\s*<?([^)\s>]+)>?(?:\s+(?:"[^"]*"|'[^']*'))?\s*\)/g;
const MARKDOWN_DEFINITION = /^[ \t]{0,3}\[[^\]]+\]:[ \t]*<?([^\s>]+)>?/gm;
const RST_DIRECTIVE = /^[ \t]*\.\.[ \t]+(?:image|figure)::[ \t]*(\S+)/gm;
const RST_LINK = /`[^`<]*<([^>\s]+)>`__?/g;
const HTML_ATTRIBUTE = /<(?:img|a)\b[^>]*?\b(?:src|href)\s*=\s*["']([^"']+)["']/gi;

export type ContentReference =
  | { kind: 'image'; raw: string; imageId: string }
  | { kind: 'post'; raw: string; slug: string }
  | { kind: 'invalid'; raw: string };

export type LinkCheckInput = {
  content: string;
  contentType?: ContentType;
  imageIds?: string[];
};

export interface LinkChecker {
  checkLinks(input: LinkCheckInput): Promise<BrokenLink[]>;
}

function patternsFor(contentType?: ContentType): RegExp[] {
  switch (contentType) {
    case 'markdown':
      return [MARKDOWN_LINK, MARKDOWN_DEFINITION, HTML_ATTRIBUTE];
    case 'restructured-text':
      return [RST_DIRECTIVE, RST_LINK, HTML_ATTRIBUTE];
    default:
      return [MARKDOWN_LINK, MARKDOWN_DEFINITION, RST_DIRECTIVE, RST_LINK, HTML_ATTRIBUTE];
  }
}

function isExternal(url: string): boolean {
  return /^[a-z][a-z0-9+.-]*:/i.test(url) || url.startsWith('//') || url.startsWith('#');
}

export function classifyReference(raw: string): ContentReference | null {
  if (isExternal(raw)) {
    return null;
  }
  const path = raw.split(/[?#]/)[0] ?? '';
  const segments = path.split('/');
  if (segments[0] !== '' || segments.length < 3) {
    return null;
  }

  const [, root, id, ...rest] = segments;
  if (root === 'images') {
    const variant = rest.join('/');
    const knownVariant = variant === '' || (IMAGE_VARIANTS as readonly string[]).includes(variant);
    return id && isValidImageId(id) && knownVariant ? { kind: 'image', raw, imageId: id } : { kind: 'invalid', raw };
  }
  if (root === 'posts') {
    const trailing = rest.join('/');
    return id && isValidSlug(id) && trailing === '' ? { kind: 'post', raw, slug: id } : { kind: 'invalid', raw };
  }
  return null;
}

/**
 * Pull every relative image or post reference out of raw or rendered
 * content, in the order they appear.
 */
export function extractReferences(content: string, contentType?: ContentType): ContentReference[] {
  const found: { index: number; raw: string }[] = [];
  const seenAt = new Set<number>();

  for (const pattern of patternsFor(contentType)) {
    for (const match of content.matchAll(pattern)) {
      const raw = match[1];
      const index = match.index ?? 0;
      if (!raw || seenAt.has(index)) {
        continue;
      }
      seenAt.add(index);
      found.push({ index, raw });
    }
  }

  return found
    .sort((a, b) => a.index - b.index)
    .map(({ raw }) => classifyReference(raw))
    .filter((reference): reference is ContentReference => reference !== null);
}

type Finding = {
  id: string;
  broken: BrokenLink;
  /**
   * Resolves true when the target exists. Findings without one are broken as written.
   */
  exists?: () => Promise<boolean>;
};

export function createLinkChecker(store: ObjectStore): LinkChecker {
  async function keyExists(key: string): Promise<boolean> {
    const { keys } = await listAll(store, key);
    return keys.includes(key);
  }

  async function hasProps(slug: string): Promise<boolean> {
    const { keys } = await listAll(store, propsPrefix(slug));
    return keys.length > 0;
  }

  return {
    async checkLinks(input) {
      const findings: Finding[] = [];
      const seen = new Set<string>();
      const add = (finding: Finding) => {
        if (!seen.has(finding.id)) {
          seen.add(finding.id);
          findings.push(finding);
        }
      };

      const addImage = (imageId: string) => {
        if (!isValidImageId(imageId)) {
          add({ id: `invalid:${imageId}`, broken: { reference: imageId, reason: 'invalid-reference' } });
          return;
        }
        const key = buildKey({ kind: 'image', imageId, variant: 'original' });
        add({ id: key, broken: { reference: imageId, reason: 'missing-image' }, exists: () => keyExists(key) });
      };

      for (const imageId of input.imageIds ?? []) {
        addImage(imageId);
      }

      for (const reference of extractReferences(input.content, input.contentType)) {
        if (reference.kind === 'image') {
          addImage(reference.imageId);
        } else if (reference.kind === 'post') {
          add({
            id: propsPrefix(reference.slug),
            broken: { reference: reference.raw, reason: 'missing-post' },
            exists: () => hasProps(reference.slug),
          });
        } else {
          add({ id: `invalid:${reference.raw}`, broken: { reference: reference.raw, reason: 'invalid-reference' } });
        }
      }

      const results = await Promise.all(findings.map((finding) => (finding.exists ? finding.exists() : false)));
      const brokenLinks = findings.filter((_, index) => !results[index]).map((finding) => finding.broken);

      if (brokenLinks.length > 0) {
        console.info(`${LOG_PREFIX} Found ${brokenLinks.length} broken references`);
      }
      return brokenLinks;
    },
  };
}
