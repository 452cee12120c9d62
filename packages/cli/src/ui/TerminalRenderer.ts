import type { TickConsumer } from '@sysvitals/core';
import type { SystemInfo, TickResult } from '@sysvitals/shared';
import { renderDashboard } from './Dashboard.js';

export interface TextSink {
  write(chunk: string): unknown;
}

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

/** Redraws the whole dashboard on every tick. */
export class TerminalRenderer implements TickConsumer {
  readonly name = 'terminal';

  constructor(
    private readonly out: TextSink,
    private readonly info: SystemInfo | null,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  onTick(result: TickResult): void {
    this.out.write(`${CLEAR_SCREEN}${renderDashboard(result, this.info, this.clock())}\n`);
  }
}
