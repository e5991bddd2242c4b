import { z } from 'zod';
import { CONTENT_TYPES, IMAGE_VARIANTS } from '@/types/blog';
import { BlogValidationError, type ValidationIssue } from '@/server/blog/errors';

export const slugSchema = z
  .string()
  .min(3)
  .max(100)
  .regex(/^[a-z0-9][a-z0-9-]*$/, 'Slug must be lowercase alphanumeric with dashes');

export const labelSchema = z
  .string()
  .min(1)
  .max(32)
  .regex(/^[a-z0-9][a-z0-9._-]*$/, 'Label must be lowercase alphanumeric with dots, dashes or underscores');

export const imageIdSchema = z
  .string()
  .min(3)
  .max(60)
  .regex(/^[a-zA-Z0-9][a-zA-Z0-9._-]*$/, 'Image id must be alphanumeric with dots, dashes or underscores');

export const postDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be formatted as YYYY-MM-DD')
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
  }, 'Date must be a real calendar date');

// Stored titles are exact: the props key embeds them, so a padded title
// would not survive a round trip.
export const titleSchema = z
  .string()
  .min(1, 'Title is required')
  .max(160)
  .refine((value) => value === value.trim(), 'Title must not start or end with whitespace');

const bskyPostUrl = z.string().url().max(300);

export const postPropsSchema = z.object({
  date: postDateSchema,
  title: titleSchema,
  contentType: z.enum(CONTENT_TYPES),
  published: z.boolean(),
  imageIds: z.array(imageIdSchema).max(100),
  bskyPostUrl: bskyPostUrl.optional(),
});

export const savePostSchema = postPropsSchema.extend({
  slug: slugSchema,
  content: z.string(),
  labels: z.array(labelSchema).max(16).default([]),
  imageIds: z.array(imageIdSchema).max(100).default([]),
  published: z.boolean().default(false),
  contentType: z.enum(CONTENT_TYPES).default('markdown'),
});

/**
 * Editor form input. Titles are trimmed here, before they reach the props key.
 */
export const postInputSchema = savePostSchema.extend({
  title: z.string().trim().pipe(titleSchema),
});

export const imageInputSchema = z.object({
  imageId: imageIdSchema,
  variant: z.enum(IMAGE_VARIANTS).default('original'),
});

export const slugInputSchema = z.object({
  slug: slugSchema,
});

export const labelInputSchema = z.object({
  label: labelSchema,
});

export type SavePostInput = z.input<typeof postInputSchema>;
export type ParsedSavePostInput = z.infer<typeof postInputSchema>;
export type ImageInput = z.input<typeof imageInputSchema>;
export type SlugInput = z.infer<typeof slugInputSchema>;
export type LabelInput = z.infer<typeof labelInputSchema>;

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Parse `value` with `schema`, reporting failures as a BlogValidationError so
 * callers see one error type before any store call is made.
 */
export function parseOrThrow<Schema extends z.ZodTypeAny>(
  schema: Schema,
  value: unknown,
  what: string
): z.infer<Schema> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = toIssues(result.error);
    const detail = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
    throw new BlogValidationError(`Invalid ${what}: ${detail}`, issues);
  }
  return result.data;
}

export function assertSlug(slug: string): string {
  return parseOrThrow(slugSchema, slug, 'slug');
}

export function assertLabel(label: string): string {
  return parseOrThrow(labelSchema, label, 'label');
}

export function assertImageId(imageId: string): string {
  return parseOrThrow(imageIdSchema, imageId, 'image id');
}

export function isValidSlug(value: string): boolean {
  return slugSchema.safeParse(value).success;
}

export function isValidLabel(value: string): boolean {
  return labelSchema.safeParse(value).success;
}

export function isValidImageId(value: string): boolean {
  return imageIdSchema.safeParse(value).success;
}
