import { buildKey, childSegment, labelPrefix, postLabelsPrefix, tryParseKey } from '@/server/blog/keys';
import { listAll, type ObjectStore } from '@/server/blog/object-store';
import { isValidSlug } from '@/server/blog/validators';

const LOG_PREFIX = '[blog-labels]';
const EMPTY_MARKER = new Uint8Array();

export type LabelIndexOptions = {
  repairOnRead?: boolean;
};

export interface LabelIndex {
  /**
   * Write the reverse marker, then the forward marker, for each label. The
   * forward marker lands last, so a label counts as added only once both
   * exist and a retried save rewrites any pair it finds incomplete.
   */
  addMarkers(slug: string, labels: string[]): Promise<void>;

  /**
   * Delete the reverse marker, then the forward marker, for each label. The
   * forward marker goes last, so a label still shows as present until both
   * are gone and a retried save removes the pair again.
   */
  removeMarkers(slug: string, labels: string[]): Promise<void>;

  listByLabel(label: string): Promise<string[]>;

  /**
   * Labels recorded in the forward index of a post.
   */
  listForwardLabels(slug: string): Promise<string[]>;

  /**
   * Best effort: re-put reverse markers for forward labels that lack one.
   * Never throws.
   */
  repairReverseMarkers(slug: string, labels: string[]): Promise<void>;

  readonly repairOnRead: boolean;
}

export function labelsFromKeys(keys: string[]): string[] {
  const labels = new Set<string>();
  for (const key of keys) {
    const parts = tryParseKey(key);
    if (parts?.kind === 'forward-label') {
      labels.add(parts.label);
    }
  }
  return Array.from(labels).sort();
}

export function createLabelIndex(store: ObjectStore, options: LabelIndexOptions = {}): LabelIndex {
  const repairOnRead = options.repairOnRead ?? false;

  async function hasForwardMarker(slug: string, label: string): Promise<boolean> {
    const key = buildKey({ kind: 'forward-label', slug, label });
    const { keys } = await listAll(store, key);
    return keys.includes(key);
  }

  async function dropOrphans(label: string, slugs: string[]): Promise<string[]> {
    const kept: string[] = [];
    for (const slug of slugs) {
      try {
        if (await hasForwardMarker(slug, label)) {
          kept.push(slug);
          continue;
        }
        console.info(`${LOG_PREFIX} Removing reverse marker ${label}/${slug} with no forward marker`);
        await store.delete(buildKey({ kind: 'reverse-label', label, slug }));
      } catch (error) {
        console.warn(`${LOG_PREFIX} Repair check failed for ${label}/${slug}; keeping entry`, error);
        kept.push(slug);
      }
    }
    return kept;
  }

  return {
    repairOnRead,

    async addMarkers(slug, labels) {
      for (const label of labels) {
        await store.put(buildKey({ kind: 'reverse-label', label, slug }), EMPTY_MARKER);
        await store.put(buildKey({ kind: 'forward-label', slug, label }), EMPTY_MARKER);
      }
    },

    async removeMarkers(slug, labels) {
      for (const label of labels) {
        await store.delete(buildKey({ kind: 'reverse-label', label, slug }));
        await store.delete(buildKey({ kind: 'forward-label', slug, label }));
      }
    },

    async listByLabel(label) {
      const prefix = labelPrefix(label);
      const { keys, commonPrefixes } = await listAll(store, prefix, '/');
      const slugs = keys
        .map((key) => childSegment(prefix, key))
        .filter((slug): slug is string => slug !== null && isValidSlug(slug));

      if (commonPrefixes.length > 0) {
        console.warn(`${LOG_PREFIX} Ignoring ${commonPrefixes.length} nested prefixes under ${prefix}`);
      }

      const unique = Array.from(new Set(slugs)).sort();
      return repairOnRead ? dropOrphans(label, unique) : unique;
    },

    async listForwardLabels(slug) {
      const { keys } = await listAll(store, postLabelsPrefix(slug));
      return labelsFromKeys(keys);
    },

    async repairReverseMarkers(slug, labels) {
      for (const label of labels) {
        try {
          const key = buildKey({ kind: 'reverse-label', label, slug });
          const { keys } = await listAll(store, key);
          if (!keys.includes(key)) {
            console.info(`${LOG_PREFIX} Restoring missing reverse marker ${key}`);
            await store.put(key, EMPTY_MARKER);
          }
        } catch (error) {
          console.warn(`${LOG_PREFIX} Unable to repair reverse marker for ${slug} (${label})`, error);
        }
      }
    },
  };
}
