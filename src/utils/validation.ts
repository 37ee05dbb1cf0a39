/**
 * vorg - Zod Validation Schemas
 *
 * Input validation for store writes and for the environment the server
 * is configured from. Each schema carries its constraints, descriptive
 * error messages and defaults.
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError listing every issue, separated by "; "
 */
export function validateInput<Output, Input>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  input: unknown
): Output {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

/** Unset and empty environment values both mean "use the default" */
const emptyAsUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

// ═══════════════════════════════════════════════════════════════════════════════
// STORE INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for importing one file as a new collection
 */
export const ImportFileInput = z.object({
  title: z.string().min(1, 'Title is required'),
  hash: z
    .string()
    .regex(/^[0-9a-f]{3,64}$/, 'Hash must be 3 to 64 lowercase hexadecimal characters'),
  ext: z
    .string()
    .regex(/^[A-Za-z0-9]{1,16}$/, 'Extension must be 1 to 16 alphanumeric characters'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER ENVIRONMENT SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for the VORG_* environment variables
 */
export const ServerEnv = z.object({
  VORG_REPOSITORY: z.preprocess(emptyAsUndefined, z.string().optional()),
  VORG_HTTP_HOST: z.preprocess(emptyAsUndefined, z.string().default('localhost')),
  VORG_HTTP_PORT: z.preprocess(
    emptyAsUndefined,
    z.coerce
      .number()
      .int('Port must be an integer')
      .min(0, 'Port must be between 0 and 65535')
      .max(65535, 'Port must be between 0 and 65535')
      .default(8000)
  ),
  VORG_SESSION_TIMEOUT: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().positive('Session timeout must be a positive number of seconds').default(30)
  ),
  VORG_MAX_BODY_BYTES: z.preprocess(
    emptyAsUndefined,
    z.coerce
      .number()
      .int('Maximum body size must be an integer')
      .min(0, 'Maximum body size cannot be negative')
      .default(1048576)
  ),
});

export type ServerEnvValues = z.infer<typeof ServerEnv>;
