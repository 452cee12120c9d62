import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Command } from 'commander';

// Mock chalk to return plain text
vi.mock('chalk', () => {
  const handler: ProxyHandler<object> = {
    get(_target, prop) {
      if (prop === 'default') return chainable;
      return chainable;
    },
    apply(_target, _thisArg, args) {
      return String(args[0]);
    },
  };

  const chainable: unknown = new Proxy(function () {} as object, handler);

  return { default: chainable };
});

// Mock ora to prevent spinner side effects
vi.mock('ora', () => {
  const spinner = {
    start: vi.fn().mockReturnThis(),
    stop: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    text: '',
  };
  return { default: vi.fn(() => spinner) };
});

import { configCommand } from '../commands/config.js';
import { exportCommand, resolveFormat } from '../commands/export.js';
import { infoCommand } from '../commands/info.js';
import { monitCommand } from '../commands/monit.js';

function getOptionFlags(command: Command): string[] {
  return command.options.map((opt) => opt.flags);
}

const SHARED_FLAGS = ['--config', '--interval', '--history', '--no-notifications', '--log-level'];

describe('CLI Command Definitions', () => {
  describe.each([
    ['monit', monitCommand],
    ['info', infoCommand],
    ['export', exportCommand],
    ['config', configCommand],
  ])('%s', (name, command) => {
    it('should be a Commander Command instance', () => {
      expect(command).toBeInstanceOf(Command);
    });

    it(`should have the name "${name}"`, () => {
      expect(command.name()).toBe(name);
    });

    it('should have a description', () => {
      expect(command.description()).toBeTruthy();
    });

    it('should accept the configuration flags', () => {
      const flags = getOptionFlags(command);
      for (const flag of SHARED_FLAGS) {
        expect(flags.some((f) => f.includes(flag))).toBe(true);
      }
    });
  });

  describe('monitCommand', () => {
    it('should have a --log-file option', () => {
      expect(getOptionFlags(monitCommand).some((f) => f.includes('--log-file'))).toBe(true);
    });
  });

  describe('infoCommand', () => {
    it('should have a --json option', () => {
      expect(getOptionFlags(infoCommand).some((f) => f.includes('--json'))).toBe(true);
    });
  });

  describe('exportCommand', () => {
    it('should default to 10 ticks', () => {
      const opt = exportCommand.options.find((o) => o.long === '--ticks');
      expect(opt?.defaultValue).toBe('10');
    });

    it('should have --format and --output options', () => {
      const flags = getOptionFlags(exportCommand);
      expect(flags.some((f) => f.includes('--format'))).toBe(true);
      expect(flags.some((f) => f.includes('--output'))).toBe(true);
    });
  });
});

describe('resolveFormat', () => {
  it('should take an explicit format', () => {
    expect(resolveFormat('json', 'out.csv')).toBe('json');
  });

  it('should infer JSON from the output extension', () => {
    expect(resolveFormat(undefined, 'run.JSON')).toBe('json');
  });

  it('should default to CSV', () => {
    expect(resolveFormat(undefined, undefined)).toBe('csv');
    expect(resolveFormat(undefined, 'run.txt')).toBe('csv');
  });

  it('should reject unknown formats', () => {
    expect(() => resolveFormat('xml', undefined)).toThrow('Unknown export format "xml" (expected csv or json)');
  });
});

describe('config command action', () => {
  let dir: string;

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should print the file, then the merged configuration', async () => {
    dir = mkdtempSync(join(tmpdir(), 'vitals-cli-'));
    const path = join(dir, 'vitals.config.json');
    writeFileSync(path, JSON.stringify({ history_capacity: 5 }));
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await configCommand.parseAsync(['--config', path, '--interval', '2s'], { from: 'user' });

    expect(log).toHaveBeenCalledTimes(2);
    expect(log.mock.calls[0][0]).toBe(`# source: ${path}`);
    const printed = JSON.parse(String(log.mock.calls[1][0]));
    expect(printed.interval_seconds).toBe(2);
    expect(printed.history_capacity).toBe(5);
    expect(printed.notifications_enabled).toBe(true);
  });
});
