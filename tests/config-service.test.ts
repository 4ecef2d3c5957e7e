/**
 * Unit tests for ConfigService.
 *
 * Tests cover:
 * - Zod schema validation (defaults, invalid data, partial recovery)
 * - Typed get/set, setBatch, onChange subscriptions
 * - Debounced, atomic save
 * - Config migration (v1 poll interval in seconds)
 * - Data directory resolution
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';

// ─── Mock fs ───
let mockFileContent: string | null = null;
let mockFileExists = false;

vi.mock('fs', () => ({
  existsSync: vi.fn(() => mockFileExists),
  readFileSync: vi.fn(() => mockFileContent ?? ''),
}));

let lastWrittenPath = '';
let lastWrittenContent = '';
let lastRenamedFrom = '';
let lastRenamedTo = '';
let writeShouldFail = false;

vi.mock('fs/promises', () => ({
  mkdir: vi.fn(async () => {}),
  writeFile: vi.fn(async (_path: string, content: string) => {
    if (writeShouldFail) throw new Error('disk full');
    lastWrittenPath = _path;
    lastWrittenContent = content;
  }),
  rename: vi.fn(async (from: string, to: string) => {
    lastRenamedFrom = from;
    lastRenamedTo = to;
  }),
}));

// ─── Mock logger ───
vi.mock('../src/main/services/logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import * as os from 'os';
import * as path from 'path';
import { ConfigService, resolveDataDir } from '../src/main/services/config';
import { ClipkeepConfigSchema, CURRENT_CONFIG_VERSION } from '../src/shared/schemas/config-schema';

const DATA_DIR = '/mock/data';

// ─── Helpers ───

function createService(fileContent?: string): ConfigService {
  if (fileContent !== undefined) {
    mockFileExists = true;
    mockFileContent = fileContent;
  } else {
    mockFileExists = false;
    mockFileContent = null;
  }
  return new ConfigService(DATA_DIR);
}

// ─── Tests ───

describe('ConfigService', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    mockFileExists = false;
    mockFileContent = null;
    lastWrittenPath = '';
    lastWrittenContent = '';
    lastRenamedFrom = '';
    lastRenamedTo = '';
    writeShouldFail = false;
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.clearAllMocks();
  });

  // ────────────── Schema defaults ──────────────

  describe('schema defaults', () => {
    it('uses default values when no config file exists', () => {
      const svc = createService();
      expect(svc.get('pollIntervalMs')).toBe(500);
      expect(svc.get('maxEntries')).toBe(500);
      expect(svc.get('maxTextSize')).toBe(1_000_000);
      expect(svc.get('maxImageSize')).toBe(10_000_000);
      expect(svc.get('previewLength')).toBe(60);
      expect(svc.get('menuDisplayCount')).toBe(10);
      expect(svc.get('redactSensitive')).toBe(true);
      expect(svc.get('logLevel')).toBe('info');
    });

    it('sets _version to CURRENT_CONFIG_VERSION', () => {
      const svc = createService();
      expect(svc.get('_version')).toBe(CURRENT_CONFIG_VERSION);
    });

    it('keeps config.json inside the data directory', () => {
      const svc = createService();
      expect(svc.getConfigPath()).toBe(path.join(DATA_DIR, 'config.json'));
    });
  });

  // ────────────── Loading from file ──────────────

  describe('loading from file', () => {
    it('loads valid JSON and merges with defaults', () => {
      const svc = createService(JSON.stringify({ maxEntries: 50, logLevel: 'debug' }));
      expect(svc.get('maxEntries')).toBe(50);
      expect(svc.get('logLevel')).toBe('debug');
      expect(svc.get('previewLength')).toBe(60);
    });

    it('handles corrupted JSON gracefully (uses defaults)', () => {
      const svc = createService('{broken json!!!');
      expect(svc.get('maxEntries')).toBe(500);
    });

    it('handles empty file gracefully', () => {
      const svc = createService('');
      expect(svc.get('pollIntervalMs')).toBe(500);
    });

    it('ignores a JSON document that is not an object', () => {
      const svc = createService('[1, 2, 3]');
      expect(svc.get('maxEntries')).toBe(500);
    });

    it('strips unknown keys', () => {
      const svc = createService(JSON.stringify({ customField: 'hello', maxEntries: 42 }));
      const all = svc.getAll();
      expect('customField' in all).toBe(false);
      expect(all.maxEntries).toBe(42);
    });

    it('keeps valid fields when another field is invalid', () => {
      const svc = createService(JSON.stringify({ maxEntries: -5, previewLength: 80 }));
      expect(svc.get('maxEntries')).toBe(500);
      expect(svc.get('previewLength')).toBe(80);
    });

    it('falls back to the default for an out-of-range poll interval', () => {
      const svc = createService(JSON.stringify({ pollIntervalMs: 10 }));
      expect(svc.get('pollIntervalMs')).toBe(500);
    });
  });

  // ────────────── Typed get/set ──────────────

  describe('typed get/set', () => {
    it('set() updates value and get() returns it', () => {
      const svc = createService();
      svc.set('maxEntries', 25);
      expect(svc.get('maxEntries')).toBe(25);
    });

    it('set() skips notification when value unchanged', () => {
      const svc = createService();
      const listener = vi.fn();
      svc.onChange('maxEntries', listener);

      svc.set('maxEntries', 500);
      expect(listener).not.toHaveBeenCalled();
    });

    it('set() rejects values the schema does not allow', () => {
      const svc = createService();
      const listener = vi.fn();
      svc.onAnyChange(listener);

      svc.set('maxEntries', 0);
      expect(svc.get('maxEntries')).toBe(500);
      expect(listener).not.toHaveBeenCalled();
    });

    it('getAll() returns a shallow copy', () => {
      const svc = createService();
      const a = svc.getAll();
      const b = svc.getAll();
      expect(a).toEqual(b);
      expect(a).not.toBe(b);
    });
  });

  // ────────────── setBatch ──────────────

  describe('setBatch', () => {
    it('updates multiple keys with a single notification', () => {
      const svc = createService();
      const listener = vi.fn();
      svc.onAnyChange(listener);

      svc.setBatch({ maxEntries: 100, previewLength: 40, redactSensitive: false });

      expect(svc.get('maxEntries')).toBe(100);
      expect(svc.get('previewLength')).toBe(40);
      expect(svc.get('redactSensitive')).toBe(false);
      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith({ maxEntries: 100, previewLength: 40, redactSensitive: false });
    });

    it('skips notification when no values actually changed', () => {
      const svc = createService();
      const listener = vi.fn();
      svc.onAnyChange(listener);

      svc.setBatch({ maxEntries: 500, logLevel: 'info' });
      expect(listener).not.toHaveBeenCalled();
    });
  });

  // ────────────── onChange subscriptions ──────────────

  describe('onChange', () => {
    it('notifies key-specific listeners with new and old value', () => {
      const svc = createService();
      const listener = vi.fn();
      svc.onChange('pollIntervalMs', listener);

      svc.set('pollIntervalMs', 250);
      expect(listener).toHaveBeenCalledWith(250, 500);
    });

    it('does not notify for other keys', () => {
      const svc = createService();
      const listener = vi.fn();
      svc.onChange('pollIntervalMs', listener);

      svc.set('previewLength', 30);
      expect(listener).not.toHaveBeenCalled();
    });

    it('unsubscribe works', () => {
      const svc = createService();
      const listener = vi.fn();
      const unsub = svc.onChange('logLevel', listener);

      unsub();
      svc.set('logLevel', 'warn');
      expect(listener).not.toHaveBeenCalled();
    });

    it('emits EventEmitter "change" event', () => {
      const svc = createService();
      const listener = vi.fn();
      svc.on('change', listener);

      svc.set('menuDisplayCount', 15);
      expect(listener).toHaveBeenCalledWith({ menuDisplayCount: 15 });
    });

    it('listener errors do not crash the service', () => {
      const svc = createService();
      const after = vi.fn();
      svc.onChange('maxEntries', () => {
        throw new Error('boom');
      });
      svc.onAnyChange(after);

      expect(() => svc.set('maxEntries', 10)).not.toThrow();
      expect(svc.get('maxEntries')).toBe(10);
      expect(after).toHaveBeenCalledTimes(1);
    });
  });

  // ────────────── Debounced, atomic save ──────────────

  describe('saving', () => {
    it('does not save immediately on set()', () => {
      const svc = createService();
      svc.set('maxEntries', 20);
      expect(lastWrittenContent).toBe('');
    });

    it('coalesces multiple set() calls into one write', async () => {
      const fsp = await import('fs/promises');
      const writeSpy = fsp.writeFile as Mock;

      const svc = createService();
      svc.set('maxEntries', 20);
      svc.set('previewLength', 30);

      vi.advanceTimersByTime(250);
      await vi.runAllTimersAsync();

      expect(writeSpy).toHaveBeenCalledTimes(1);
      const written = JSON.parse(lastWrittenContent);
      expect(written.maxEntries).toBe(20);
      expect(written.previewLength).toBe(30);
    });

    it('writes to .tmp then renames over config.json', async () => {
      const svc = createService();
      svc.set('logLevel', 'error');

      vi.advanceTimersByTime(250);
      await vi.runAllTimersAsync();

      const target = path.join(DATA_DIR, 'config.json');
      expect(lastWrittenPath).toBe(`${target}.tmp`);
      expect(lastRenamedFrom).toBe(`${target}.tmp`);
      expect(lastRenamedTo).toBe(target);
    });

    it('keeps the in-memory value when the write fails', async () => {
      writeShouldFail = true;
      const svc = createService();
      svc.set('maxEntries', 30);

      vi.advanceTimersByTime(250);
      await vi.runAllTimersAsync();

      expect(svc.get('maxEntries')).toBe(30);
      expect(lastRenamedTo).toBe('');
    });

    it('forceSave() writes immediately and cancels the pending save', async () => {
      const fsp = await import('fs/promises');
      const writeSpy = fsp.writeFile as Mock;

      const svc = createService();
      svc.set('maxEntries', 40);
      await svc.forceSave();
      expect(JSON.parse(lastWrittenContent).maxEntries).toBe(40);

      vi.advanceTimersByTime(500);
      await vi.runAllTimersAsync();
      expect(writeSpy).toHaveBeenCalledTimes(1);
    });

    it('shutdown() flushes and clears listeners', async () => {
      const svc = createService();
      const listener = vi.fn();
      svc.onChange('maxEntries', listener);

      svc.set('maxEntries', 70);
      await svc.shutdown();
      expect(JSON.parse(lastWrittenContent).maxEntries).toBe(70);

      svc.set('maxEntries', 80);
      expect(listener).toHaveBeenCalledTimes(1);
    });
  });

  // ────────────── Migration ──────────────

  describe('config migration', () => {
    it('converts a v1 poll interval in seconds to milliseconds', () => {
      const svc = createService(JSON.stringify({ _version: 1, pollInterval: 1.5 }));
      expect(svc.get('pollIntervalMs')).toBe(1500);
      expect(svc.get('_version')).toBe(CURRENT_CONFIG_VERSION);
      expect('pollInterval' in svc.getAll()).toBe(false);
    });

    it('treats a file without _version as v1', () => {
      const svc = createService(JSON.stringify({ pollInterval: 2 }));
      expect(svc.get('pollIntervalMs')).toBe(2000);
    });

    it('prefers an explicit pollIntervalMs over the legacy field', () => {
      const svc = createService(JSON.stringify({ _version: 1, pollInterval: 2, pollIntervalMs: 700 }));
      expect(svc.get('pollIntervalMs')).toBe(700);
    });

    it('does not migrate config already at current version', () => {
      const svc = createService(JSON.stringify({ _version: CURRENT_CONFIG_VERSION, pollInterval: 3 }));
      expect(svc.get('pollIntervalMs')).toBe(500);
    });
  });

  // ────────────── Zod schema ──────────────

  describe('ClipkeepConfigSchema', () => {
    it('parses empty object with all defaults', () => {
      const result = ClipkeepConfigSchema.safeParse({});
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data._version).toBe(CURRENT_CONFIG_VERSION);
        expect(result.data.maxEntries).toBe(500);
      }
    });

    it('rejects an unknown log level', () => {
      expect(ClipkeepConfigSchema.safeParse({ logLevel: 'verbose' }).success).toBe(false);
    });

    it('rejects a fractional entry cap', () => {
      expect(ClipkeepConfigSchema.safeParse({ maxEntries: 2.5 }).success).toBe(false);
    });
  });
});

// ────────────── Data directory ──────────────

describe('resolveDataDir', () => {
  it('uses CLIPKEEP_DATA_DIR when set', () => {
    expect(resolveDataDir({ CLIPKEEP_DATA_DIR: '/srv/clips' })).toBe(path.resolve('/srv/clips'));
  });

  it('ignores a blank override', () => {
    expect(resolveDataDir({ CLIPKEEP_DATA_DIR: '  ' })).toBe(path.join(os.homedir(), '.local', 'share', 'clipkeep'));
  });

  it('defaults to ~/.local/share/clipkeep', () => {
    expect(resolveDataDir({})).toBe(path.join(os.homedir(), '.local', 'share', 'clipkeep'));
  });
});
