import { z } from 'zod';
import {
  DEFAULT_CPU_THRESHOLD,
  DEFAULT_HISTORY_CAPACITY,
  DEFAULT_INTERVAL_SECONDS,
  DEFAULT_MAX_CONSUMER_FAILURES,
  DEFAULT_MEMORY_THRESHOLD,
  MIN_INTERVAL_SECONDS,
} from '../constants.js';

export const alertThresholdSchema = z
  .object({
    enter: z.number().min(0).max(100),
    clear: z.number().min(0).max(100),
  })
  .refine((t) => t.clear < t.enter, {
    message: 'clear threshold must be lower than enter threshold',
    path: ['clear'],
  });

export const quantityNameSchema = z
  .string()
  .regex(/^(cpu|memory|disk:.+)$/, 'quantity must be "cpu", "memory" or "disk:<mount>"');

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export const vitalsConfigSchema = z.object({
  interval_seconds: z.number().min(MIN_INTERVAL_SECONDS).default(DEFAULT_INTERVAL_SECONDS),
  history_capacity: z.number().int().min(1).default(DEFAULT_HISTORY_CAPACITY),
  alert_thresholds: z.record(quantityNameSchema, alertThresholdSchema).default({
    cpu: { ...DEFAULT_CPU_THRESHOLD },
    memory: { ...DEFAULT_MEMORY_THRESHOLD },
  }),
  notifications_enabled: z.boolean().default(true),
  provider_timeout_ms: z.number().int().positive().optional(),
  max_consecutive_failures: z.number().int().min(1).default(DEFAULT_MAX_CONSUMER_FAILURES),
  log_level: logLevelSchema.default('info'),
});

/** Same fields, none defaulted: used for run-time reconfiguration. */
export const vitalsConfigPatchSchema = z
  .object({
    interval_seconds: z.number().min(MIN_INTERVAL_SECONDS),
    history_capacity: z.number().int().min(1),
    alert_thresholds: z.record(quantityNameSchema, alertThresholdSchema),
    notifications_enabled: z.boolean(),
    provider_timeout_ms: z.number().int().positive(),
    max_consecutive_failures: z.number().int().min(1),
    log_level: logLevelSchema,
  })
  .partial();

export type ValidatedVitalsConfig = z.infer<typeof vitalsConfigSchema>;
export type VitalsConfigInput = z.input<typeof vitalsConfigSchema>;
export type VitalsConfigPatch = z.infer<typeof vitalsConfigPatchSchema>;
