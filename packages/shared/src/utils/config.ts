import type { ZodError } from 'zod';
import {
  vitalsConfigPatchSchema,
  vitalsConfigSchema,
  type ValidatedVitalsConfig,
  type VitalsConfigPatch,
} from '../schemas/config.schema.js';
import { ConfigValidationError } from './errors.js';

function toMessages(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a full configuration object, filling defaults.
 * Throws ConfigValidationError listing every problem found.
 */
export function parseConfig(input: unknown): ValidatedVitalsConfig {
  const result = vitalsConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigValidationError(toMessages(result.error));
  }
  return result.data;
}

export function parseConfigPatch(input: unknown): VitalsConfigPatch {
  const result = vitalsConfigPatchSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigValidationError(toMessages(result.error));
  }
  return result.data;
}
