import type { AlertEvent, AlertState, AlertThreshold } from '@sysvitals/shared';

interface QuantityState {
  threshold: AlertThreshold;
  alerted: boolean;
  since: Date | null;
}

/**
 * Two-state hysteresis per monitored quantity.
 *
 *   normal  --(value > enter)--> alerted   emits `raised`
 *   alerted --(value < clear)--> normal    emits `cleared`
 *
 * Values between `clear` and `enter` never change state.
 */
export class ThresholdAlerter {
  private quantities: Map<string, QuantityState> = new Map();

  constructor(thresholds: Record<string, AlertThreshold> = {}) {
    this.setThresholds(thresholds);
  }

  /**
   * Replace the threshold table. Quantities that stay keep their current
   * state; removed ones are forgotten.
   */
  setThresholds(thresholds: Record<string, AlertThreshold>): void {
    const next: Map<string, QuantityState> = new Map();
    for (const [quantity, threshold] of Object.entries(thresholds)) {
      if (!(threshold.clear < threshold.enter)) {
        throw new RangeError(
          `Alert threshold for ${quantity}: clear (${threshold.clear}) must be below enter (${threshold.enter})`,
        );
      }
      const existing = this.quantities.get(quantity);
      next.set(quantity, {
        threshold: { enter: threshold.enter, clear: threshold.clear },
        alerted: existing?.alerted ?? false,
        since: existing?.since ?? null,
      });
    }
    this.quantities = next;
  }

  /**
   * Run one transition for `quantity`. Unknown quantities and missing values
   * are ignored.
   */
  evaluate(quantity: string, value: number | null, timestamp: Date): AlertEvent | null {
    const state = this.quantities.get(quantity);
    if (!state || value === null || !Number.isFinite(value)) return null;

    if (!state.alerted && value > state.threshold.enter) {
      state.alerted = true;
      state.since = timestamp;
      return { type: 'raised', quantity, value, threshold: state.threshold.enter, timestamp };
    }

    if (state.alerted && value < state.threshold.clear) {
      state.alerted = false;
      state.since = timestamp;
      return { type: 'cleared', quantity, value, threshold: state.threshold.clear, timestamp };
    }

    return null;
  }

  /** Evaluate several quantities at once, in the order given. */
  evaluateAll(values: Record<string, number | null>, timestamp: Date): AlertEvent[] {
    const events: AlertEvent[] = [];
    for (const [quantity, value] of Object.entries(values)) {
      const event = this.evaluate(quantity, value, timestamp);
      if (event) events.push(event);
    }
    return events;
  }

  quantityNames(): string[] {
    return Array.from(this.quantities.keys());
  }

  getStates(): AlertState[] {
    return Array.from(this.quantities.entries()).map(([quantity, state]): AlertState => ({
      quantity,
      status: state.alerted ? 'alerted' : 'normal',
      enter: state.threshold.enter,
      clear: state.threshold.clear,
      since: state.since,
    }));
  }

  reset(): void {
    for (const state of this.quantities.values()) {
      state.alerted = false;
      state.since = null;
    }
  }
}
