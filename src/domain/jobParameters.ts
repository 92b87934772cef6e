import { z } from 'zod';
import {
  ENCODING_PRESETS,
  TRANSITION_STYLES,
  WATERMARK_POSITIONS,
  type JobParameters,
} from './entities/Job.js';
import { ValidationError } from './errors.js';

export const DEFAULT_MAX_CUSTOMER_NAME_LENGTH = 100;

const ASSET_REFERENCE = /^(?!\/)(?!.*\.\.)[A-Za-z0-9._\-/]+$/;

const upperCased = (value: unknown) => (typeof value === 'string' ? value.trim().toUpperCase() : value);
const emptyToNull = (value: unknown) => (value === '' || value === undefined ? null : value);

const assetReference = z.preprocess(
  emptyToNull,
  z
    .string()
    .max(512)
    .regex(ASSET_REFERENCE, { message: 'must be a relative storage key without ".."' })
    .nullable()
);

/**
 * Keeps letters, digits, spaces and `._-`; collapses whitespace and truncates.
 */
export function sanitizeCustomerName(
  name: string,
  maxLength: number = DEFAULT_MAX_CUSTOMER_NAME_LENGTH
): string {
  return name
    .replace(/[^\p{L}\p{N} ._-]/gu, '')
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, maxLength)
    .trim();
}

function buildSchema(maxCustomerNameLength: number) {
  return z.object({
    videoUrl: z
      .string()
      .url()
      .refine((value) => /^https?:\/\//i.test(value), { message: 'must be an http(s) URL' }),
    customerName: z
      .string()
      .transform((value) => sanitizeCustomerName(value, maxCustomerNameLength))
      .refine((value) => value.length > 0, { message: 'is required' }),
    introClip: assetReference.default(null),
    outroClip: assetReference.default(null),
    transitionStyle: z.preprocess(upperCased, z.enum(TRANSITION_STYLES)).default('FADE'),
    encodingPreset: z.preprocess(upperCased, z.enum(ENCODING_PRESETS)).default('STANDARD'),
    overlay: z
      .object({
        customerText: z.boolean().default(false),
        watermark: assetReference.default(null),
        watermarkPosition: z.enum(WATERMARK_POSITIONS).default('bottom-right'),
      })
      .default({}),
  });
}

/**
 * Validates a submission and returns the immutable parameter snapshot.
 * Throws ValidationError listing every offending field.
 */
export function parseJobParameters(
  input: unknown,
  options: { maxCustomerNameLength?: number } = {}
): JobParameters {
  const schema = buildSchema(options.maxCustomerNameLength ?? DEFAULT_MAX_CUSTOMER_NAME_LENGTH);
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
    throw new ValidationError(`Invalid job parameters: ${summary}`, { issues });
  }
  return result.data;
}
