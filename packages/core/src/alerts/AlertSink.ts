import type pino from 'pino';
import { formatPercent, getLogger } from '@sysvitals/shared';
import type { AlertEvent } from '@sysvitals/shared';

/**
 * Receives alert transitions. Delivery is fire-and-forget from the engine's
 * point of view: a returned promise is not awaited by the sampling loop.
 */
export interface AlertSink {
  notify(event: AlertEvent): void | Promise<void>;
}

const QUANTITY_LABELS: Record<string, string> = {
  cpu: 'CPU usage',
  memory: 'Memory usage',
};

export function describeQuantity(quantity: string): string {
  if (quantity.startsWith('disk:')) {
    return `Disk usage on ${quantity.slice('disk:'.length)}`;
  }
  return QUANTITY_LABELS[quantity] ?? quantity;
}

export function formatAlertMessage(event: AlertEvent): string {
  const label = describeQuantity(event.quantity);
  if (event.type === 'raised') {
    return `${label} is high: ${formatPercent(event.value)} (>${event.threshold}%)`;
  }
  return `${label} is back to normal: ${formatPercent(event.value)} (<${event.threshold}%)`;
}

export class LoggerAlertSink implements AlertSink {
  private logger: pino.Logger;

  constructor(logger: pino.Logger = getLogger('alerts')) {
    this.logger = logger;
  }

  notify(event: AlertEvent): void {
    const fields = { quantity: event.quantity, value: event.value, threshold: event.threshold };
    if (event.type === 'raised') {
      this.logger.warn(fields, formatAlertMessage(event));
    } else {
      this.logger.info(fields, formatAlertMessage(event));
    }
  }
}
