import { z } from 'zod';
import type { ImportConfig } from '../types/ImportJob';
import { ValidationError } from './errors';

/**
 * Run a zod schema and surface the first issue as a ValidationError
 */
export function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? 'invalid input');
  }
  return result.data;
}

const unixTimestamp = (field: string) => {
  const message = `${field} must be a unix timestamp`;
  return z.number({ invalid_type_error: message }).finite(message).nullish();
};

const CAMERAS_MESSAGE = 'cameras must be a list of device ids';
const OBJECT_MESSAGE = 'import config must be an object';

export const ImportConfigSchema = z.object(
  {
    userId: z.string().optional().catch(undefined),
    after: unixTimestamp('after'),
    before: unixTimestamp('before'),
    cameras: z.array(z.string({ invalid_type_error: CAMERAS_MESSAGE }), { invalid_type_error: CAMERAS_MESSAGE }).nullish(),
  },
  { invalid_type_error: OBJECT_MESSAGE, required_error: OBJECT_MESSAGE }
);

/**
 * Validate an import config coming from a request body or a stored job row
 */
export function parseImportConfig(value: unknown, defaultUserId?: string): ImportConfig {
  const raw = parseWith(ImportConfigSchema, value);

  const userId = raw.userId || defaultUserId;
  if (!userId) {
    throw new ValidationError('userId is required');
  }

  const config: ImportConfig = { userId };
  if (raw.after !== undefined && raw.after !== null) config.after = raw.after;
  if (raw.before !== undefined && raw.before !== null) config.before = raw.before;
  if (raw.cameras && raw.cameras.length > 0) config.cameras = raw.cameras;
  return config;
}
