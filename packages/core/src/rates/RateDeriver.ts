import type { CounterName, DerivedRates, NetworkCounters } from '@sysvitals/shared';

export const ZERO_RATES: Readonly<DerivedRates> = Object.freeze({
  bytesSentPerSec: 0,
  bytesRecvPerSec: 0,
  packetsSentPerSec: 0,
  packetsRecvPerSec: 0,
});

const COUNTER_TO_RATE: ReadonlyArray<[CounterName, keyof DerivedRates]> = [
  ['bytesSent', 'bytesSentPerSec'],
  ['bytesRecv', 'bytesRecvPerSec'],
  ['packetsSent', 'packetsSentPerSec'],
  ['packetsRecv', 'packetsRecvPerSec'],
];

export interface RateDerivation {
  rates: DerivedRates;
  /** Counters that went backwards and were reported as 0. */
  clamped: CounterName[];
}

/**
 * Per-second rates between two cumulative counter readings.
 *
 * A counter that decreased (interface restart, wraparound, bogus reading)
 * reports 0 for this interval and is listed in `clamped`. `elapsedSeconds`
 * must be positive; see {@link RateTracker} for the guarded variant.
 */
export function deriveRates(
  prev: NetworkCounters,
  curr: NetworkCounters,
  elapsedSeconds: number,
): RateDerivation {
  const rates: DerivedRates = { ...ZERO_RATES };
  const clamped: CounterName[] = [];

  for (const [counter, rate] of COUNTER_TO_RATE) {
    const delta = curr[counter] - prev[counter];
    if (delta < 0) {
      clamped.push(counter);
      continue;
    }
    rates[rate] = delta / elapsedSeconds;
  }

  return { rates, clamped };
}

export type RateUpdate =
  | { kind: 'derived'; rates: DerivedRates; clamped: CounterName[]; elapsedSeconds: number }
  | { kind: 'initial'; rates: DerivedRates }
  | { kind: 'unavailable'; rates: null }
  | { kind: 'clock-anomaly'; rates: DerivedRates; elapsedSeconds: number };

/**
 * Keeps the last good counter reading and the time it was taken. A tick whose
 * counters are missing has no rates; the next good reading is differenced
 * against the last good one over the real elapsed time. A tick whose clock did
 * not advance repeats the last rates instead of dividing by zero.
 */
export class RateTracker {
  private lastCounters: NetworkCounters | null = null;
  private lastAt = 0;
  private lastRates: DerivedRates = { ...ZERO_RATES };

  update(curr: NetworkCounters | null, timestamp: Date): RateUpdate {
    if (curr === null) {
      return { kind: 'unavailable', rates: null };
    }

    const prev = this.lastCounters;
    const prevAt = this.lastAt;
    this.lastCounters = curr;
    this.lastAt = timestamp.getTime();

    if (prev === null) {
      return { kind: 'initial', rates: { ...ZERO_RATES } };
    }

    const elapsedSeconds = (timestamp.getTime() - prevAt) / 1000;
    if (!Number.isFinite(elapsedSeconds) || elapsedSeconds <= 0) {
      return { kind: 'clock-anomaly', rates: { ...this.lastRates }, elapsedSeconds };
    }

    const { rates, clamped } = deriveRates(prev, curr, elapsedSeconds);
    this.lastRates = rates;
    return { kind: 'derived', rates: { ...rates }, clamped, elapsedSeconds };
  }

  getLastRates(): DerivedRates {
    return { ...this.lastRates };
  }
}
