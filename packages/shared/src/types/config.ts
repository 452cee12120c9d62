export interface AlertThreshold {
  enter: number;
  clear: number;
}

export interface VitalsConfig {
  /** Seconds between ticks, >= 0.1 */
  interval_seconds: number;
  history_capacity: number;
  /** Keyed by quantity: `cpu`, `memory` or `disk:<mount>` */
  alert_thresholds: Record<string, AlertThreshold>;
  notifications_enabled: boolean;
  /** Per provider call; defaults to the interval, capped at 5s */
  provider_timeout_ms?: number;
  max_consecutive_failures: number;
  log_level: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
}
