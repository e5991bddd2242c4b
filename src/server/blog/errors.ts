export type BlogErrorCode =
  | 'validation'
  | 'corrupt'
  | 'not_found'
  | 'conflict'
  | 'inconsistent'
  | 'store_unavailable'
  | 'partial';

export abstract class BlogStoreError extends Error {
  abstract readonly code: BlogErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export type ValidationIssue = {
  path: string;
  message: string;
};

export class BlogValidationError extends BlogStoreError {
  readonly code = 'validation';
  readonly retryable = false;
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = 'BlogValidationError';
    this.issues = issues;
  }
}

export class PropsDecodeError extends BlogStoreError {
  readonly code = 'corrupt';
  readonly retryable = false;
  readonly encoded: string;

  constructor(encoded: string, reason: string, options?: { cause?: unknown }) {
    super(`Corrupt post props: ${reason}`, options);
    this.name = 'PropsDecodeError';
    this.encoded = encoded;
  }
}

export class KeyDecodeError extends BlogStoreError {
  readonly code = 'corrupt';
  readonly retryable = false;
  readonly key: string;

  constructor(key: string, reason: string) {
    super(`Unrecognised object key "${key}": ${reason}`);
    this.name = 'KeyDecodeError';
    this.key = key;
  }
}

export class PostNotFoundError extends BlogStoreError {
  readonly code = 'not_found';
  readonly retryable = false;
  readonly slug: string;

  constructor(slug: string) {
    super(`Post "${slug}" not found`);
    this.name = 'PostNotFoundError';
    this.slug = slug;
  }
}

export class PostAlreadyExistsError extends BlogStoreError {
  readonly code = 'conflict';
  readonly retryable = false;
  readonly slug: string;

  constructor(slug: string) {
    super(`Post "${slug}" already exists`);
    this.name = 'PostAlreadyExistsError';
    this.slug = slug;
  }
}

export class ImageNotFoundError extends BlogStoreError {
  readonly code = 'not_found';
  readonly retryable = false;
  readonly imageId: string;
  readonly variant?: string;

  constructor(imageId: string, variant?: string) {
    super(variant ? `Image "${imageId}" has no "${variant}" variant` : `Image "${imageId}" not found`);
    this.name = 'ImageNotFoundError';
    this.imageId = imageId;
    this.variant = variant;
  }
}

export class PostInconsistentError extends BlogStoreError {
  readonly code = 'inconsistent';
  readonly retryable = true;
  readonly slug: string;

  constructor(slug: string, detail: string) {
    super(`Post "${slug}" is in an inconsistent state: ${detail}`);
    this.name = 'PostInconsistentError';
    this.slug = slug;
  }
}

export class StoreUnavailableError extends BlogStoreError {
  readonly code = 'store_unavailable';
  readonly retryable = true;
  readonly operation: string;
  readonly key: string;

  constructor(operation: string, key: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Object store ${operation} failed for "${key}": ${detail}`, { cause });
    this.name = 'StoreUnavailableError';
    this.operation = operation;
    this.key = key;
  }
}

export type SaveStep = 'content' | 'props' | 'label-add' | 'label-remove' | 'props-cleanup';
export type DeleteStep = 'props' | 'post-keys' | 'reverse-labels';

/**
 * A multi-key operation failed after earlier steps were applied. Every step is
 * safe to repeat, so the whole operation may be retried.
 */
export class PartialWriteError extends BlogStoreError {
  readonly code = 'partial';
  readonly retryable = true;
  readonly operation: 'save' | 'delete';
  readonly step: SaveStep | DeleteStep;
  readonly slug: string;

  constructor(operation: 'save' | 'delete', slug: string, step: SaveStep | DeleteStep, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Partial ${operation} of post "${slug}" failed at step "${step}": ${detail}`, { cause });
    this.name = 'PartialWriteError';
    this.operation = operation;
    this.step = step;
    this.slug = slug;
  }
}

export function isBlogStoreError(error: unknown): error is BlogStoreError {
  return error instanceof BlogStoreError;
}

export function isRetryable(error: unknown): boolean {
  return isBlogStoreError(error) && error.retryable;
}
