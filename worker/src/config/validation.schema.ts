import { z } from 'zod';

const positiveInteger = z
  .string()
  .regex(/^\d+$/, 'must be a positive integer')
  .refine((value) => Number(value) > 0, 'must be greater than zero')
  .optional();

const positiveNumber = z
  .string()
  .regex(/^\d+(\.\d+)?$/, 'must be a positive number')
  .refine((value) => Number(value) > 0, 'must be greater than zero')
  .optional();

const commaList = z
  .string()
  .refine(
    (value) => value.split(',').some((item) => item.trim().length > 0),
    'must list at least one value'
  )
  .optional();

/**
 * Environment variables read by configuration.ts. Unknown variables pass through.
 */
export const validationSchema = z
  .object({
    PROBE_CHUNK_SIZE_BYTES: positiveInteger,
    PROBE_FILE_TIMEOUT_MS: positiveInteger,
    PROBE_MAX_METADATA_BOX_BYTES: positiveInteger,
    PROBE_SUPPORTED_EXTENSIONS: commaList,

    BRIDGE_ANNOUNCE_INTERVAL_MS: positiveInteger,
    BRIDGE_ANNOUNCE_MAX_ATTEMPTS: positiveInteger,
    BRIDGE_POLL_INTERVAL_MS: positiveInteger,
    BRIDGE_POLL_MAX_ATTEMPTS: positiveInteger,
    BRIDGE_HANDSHAKE_GRACE_MS: positiveInteger,

    HOST_BASE_URL: z.string().url().optional(),

    POLICY_ALLOWED_FORMATS: commaList,
    POLICY_ALLOWED_VIDEO_CODECS: commaList,
    POLICY_MAX_SIZE_MIB: positiveNumber,

    REPORT_OUTPUT_DIR: z.string().min(1).optional(),
  })
  .passthrough();

/**
 * `validate` hook for ConfigModule.forRoot
 */
export function validateEnv(env: Record<string, unknown>): Record<string, unknown> {
  const result = validationSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Config validation error: ${details}`);
  }
  return result.data;
}
