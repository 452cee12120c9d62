import type { MetricCategory } from '../types/index.js';

export class VitalsError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'VitalsError';
    this.code = code;
  }
}

export class ProviderUnavailableError extends VitalsError {
  public readonly category: MetricCategory;

  constructor(category: MetricCategory, reason: string, code: string = 'PROVIDER_UNAVAILABLE') {
    super(`Metrics provider could not read ${category}: ${reason}`, code);
    this.name = 'ProviderUnavailableError';
    this.category = category;
  }
}

/** Handled exactly like ProviderUnavailableError by the sampler. */
export class ProviderTimeoutError extends ProviderUnavailableError {
  public readonly timeoutMs: number;

  constructor(category: MetricCategory, timeoutMs: number) {
    super(category, `timed out after ${timeoutMs}ms`, 'PROVIDER_TIMEOUT');
    this.name = 'ProviderTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ConsumerFailureError extends VitalsError {
  public readonly consumer: string;
  public readonly tick: number;

  constructor(consumer: string, tick: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Consumer "${consumer}" failed on tick ${tick}: ${reason}`, 'CONSUMER_FAILURE');
    this.name = 'ConsumerFailureError';
    this.consumer = consumer;
    this.tick = tick;
    this.cause = cause;
  }
}

export class ConfigValidationError extends VitalsError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

export class EngineStateError extends VitalsError {
  constructor(message: string) {
    super(message, 'ENGINE_STATE');
    this.name = 'EngineStateError';
  }
}
