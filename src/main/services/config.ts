/**
 * ConfigService: typed, validated configuration with change subscriptions.
 *
 * Features:
 * - Zod schema validation on load (corrupted JSON → safe defaults)
 * - Typed get<K>/set<K> with full TypeScript inference
 * - setBatch() for multiple key updates in a single save
 * - onChange<K>() subscriptions for live updates
 * - Debounced save (200ms): multiple set() calls → single write
 * - Atomic write (temp file + rename)
 * - Config version tracking + ordered migrations
 *
 * @module main/services/config
 */

import * as fs from 'fs';
import * as fsp from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { EventEmitter } from 'events';
import { createLogger } from './logger';

import { ClipkeepConfigSchema, CURRENT_CONFIG_VERSION, CONFIG_MIGRATIONS } from '@shared/schemas/config-schema';
import type { ClipkeepConfigParsed } from '@shared/schemas/config-schema';
import { CONFIG_FILE_NAME, DATA_DIR_ENV } from '@shared/constants';
import { ClipkeepError, ErrorCode } from '@shared/types/errors';

export type { ClipkeepConfig } from '@shared/types/config';

const log = createLogger('Config');

/** Delay before flushing config to disk (ms). Multiple set() calls within this window = single write. */
const SAVE_DELAY_MS = 200;

type ConfigKey = keyof ClipkeepConfigParsed;

const CONFIG_KEYS: readonly ConfigKey[] = ClipkeepConfigSchema.keyof().options;

/**
 * Data directory: `$CLIPKEEP_DATA_DIR`, else `~/.local/share/clipkeep`.
 */
export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[DATA_DIR_ENV];
  if (override && override.trim()) return path.resolve(override);
  return path.join(os.homedir(), '.local', 'share', 'clipkeep');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─── Change listener types ───

type ChangeCallback<K extends ConfigKey> = (newVal: ClipkeepConfigParsed[K], oldVal: ClipkeepConfigParsed[K]) => void;

type AnyChangeCallback = (changes: Partial<ClipkeepConfigParsed>) => void;

type ChangeDispatcher = (changes: Partial<ClipkeepConfigParsed>, oldValues: Partial<ClipkeepConfigParsed>) => void;

// ─── ConfigService ───

export class ConfigService extends EventEmitter {
  private readonly configPath: string;
  private config: ClipkeepConfigParsed;
  private saveTimer: ReturnType<typeof setTimeout> | null = null;
  private saving = false;
  /** Another save was requested while one was in progress */
  private pendingSave = false;

  /** Per-key change listeners */
  private keyListeners = new Map<ConfigKey, Set<ChangeDispatcher>>();
  /** Listeners for any config change */
  private anyListeners = new Set<AnyChangeCallback>();

  constructor(dataDir: string) {
    super();
    this.configPath = path.join(dataDir, CONFIG_FILE_NAME);
    this.config = this.loadConfig();
  }

  getConfigPath(): string {
    return this.configPath;
  }

  // ────────────── Load / Save ──────────────

  private loadConfig(): ClipkeepConfigParsed {
    let raw: Record<string, unknown> = {};

    try {
      if (fs.existsSync(this.configPath)) {
        const parsed: unknown = JSON.parse(fs.readFileSync(this.configPath, 'utf8'));
        if (isRecord(parsed)) {
          raw = parsed;
        } else {
          log.warn('Config file is not a JSON object, using defaults');
        }
      }
    } catch (error) {
      const err = ClipkeepError.from(error, ErrorCode.CONFIG_LOAD_ERROR, { path: this.configPath });
      log.error('Failed to read config file, using defaults:', err.message);
    }

    raw = this.migrateConfig(raw);

    // Safe parse fills in defaults and strips unknown fields
    const result = ClipkeepConfigSchema.safeParse(raw);
    if (result.success) {
      return result.data;
    }

    log.warn('Config validation failed, keeping valid fields. Issues:', result.error.issues);
    return { ...ClipkeepConfigSchema.parse({}), ...this.pickValidFields(raw) };
  }

  /**
   * Fields of the raw config that individually pass validation.
   */
  private pickValidFields(raw: Record<string, unknown>): Partial<ClipkeepConfigParsed> {
    const recovered: Partial<ClipkeepConfigParsed> = {};
    for (const key of CONFIG_KEYS) {
      if (key in raw) this.recoverField(key, raw[key], recovered);
    }
    return recovered;
  }

  private recoverField<K extends ConfigKey>(key: K, value: unknown, into: Partial<ClipkeepConfigParsed>): void {
    const partial = ClipkeepConfigSchema.safeParse({ [key]: value });
    if (partial.success) {
      into[key] = partial.data[key];
    }
  }

  /**
   * Run ordered migrations on raw config data.
   */
  private migrateConfig(raw: Record<string, unknown>): Record<string, unknown> {
    let version = typeof raw._version === 'number' ? raw._version : 0;
    let migrated = { ...raw };

    while (version < CURRENT_CONFIG_VERSION) {
      const migration = CONFIG_MIGRATIONS[version];
      if (migration) {
        log.info(`Migrating config v${version} → v${version + 1}`);
        migrated = migration(migrated);
      }
      version++;
    }

    migrated._version = CURRENT_CONFIG_VERSION;
    return migrated;
  }

  /**
   * Schedule a debounced save. Multiple calls within SAVE_DELAY_MS → single write.
   */
  private scheduleSave(): void {
    if (this.saveTimer) clearTimeout(this.saveTimer);
    this.saveTimer = setTimeout(() => {
      this.saveTimer = null;
      void this.flushSave();
    }, SAVE_DELAY_MS);
  }

  /** Write to a temp file, then rename over the config */
  private async flushSave(): Promise<void> {
    if (this.saving) {
      this.pendingSave = true;
      return;
    }
    this.saving = true;
    try {
      await fsp.mkdir(path.dirname(this.configPath), { recursive: true });
      const tmpPath = this.configPath + '.tmp';
      await fsp.writeFile(tmpPath, JSON.stringify(this.config, null, 2), 'utf8');
      await fsp.rename(tmpPath, this.configPath);
    } catch (error) {
      const err = ClipkeepError.from(error, ErrorCode.CONFIG_SAVE_ERROR, { path: this.configPath });
      log.error('Failed to save config:', err.message);
    } finally {
      this.saving = false;
      if (this.pendingSave) {
        this.pendingSave = false;
        void this.flushSave();
      }
    }
  }

  /**
   * Force immediate save. Used during shutdown.
   */
  async forceSave(): Promise<void> {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = null;
    }
    await this.flushSave();
  }

  // ────────────── Typed accessors ──────────────

  get<K extends ConfigKey>(key: K): ClipkeepConfigParsed[K] {
    return this.config[key];
  }

  /**
   * Set a single config value. Triggers debounced save and change notifications.
   */
  set<K extends ConfigKey>(key: K, value: ClipkeepConfigParsed[K]): void {
    const changes: Partial<ClipkeepConfigParsed> = {};
    const oldValues: Partial<ClipkeepConfigParsed> = {};
    if (this.applyKey(key, value, changes, oldValues)) {
      this.notifyChange(changes, oldValues);
      this.scheduleSave();
    }
  }

  /**
   * Set multiple config values at once. Single save, single change notification.
   */
  setBatch(updates: Partial<ClipkeepConfigParsed>): void {
    const changes: Partial<ClipkeepConfigParsed> = {};
    const oldValues: Partial<ClipkeepConfigParsed> = {};
    let hasChanges = false;

    for (const key of CONFIG_KEYS) {
      if (this.applyKey(key, updates[key], changes, oldValues)) hasChanges = true;
    }

    if (hasChanges) {
      this.notifyChange(changes, oldValues);
      this.scheduleSave();
    }
  }

  /** Validate and store one value; false when absent or unchanged */
  private applyKey<K extends ConfigKey>(
    key: K,
    value: ClipkeepConfigParsed[K] | undefined,
    changes: Partial<ClipkeepConfigParsed>,
    oldValues: Partial<ClipkeepConfigParsed>,
  ): boolean {
    if (value === undefined || this.config[key] === value) return false;

    const check = ClipkeepConfigSchema.safeParse({ ...this.config, [key]: value });
    if (!check.success) {
      log.warn(`Rejected invalid value for "${String(key)}":`, check.error.issues);
      return false;
    }

    oldValues[key] = this.config[key];
    changes[key] = value;
    this.config[key] = value;
    return true;
  }

  /**
   * Shallow copy of the full config.
   */
  getAll(): ClipkeepConfigParsed {
    return { ...this.config };
  }

  // ────────────── Reactive subscriptions ──────────────

  /**
   * Subscribe to changes of a specific config key.
   * Returns an unsubscribe function.
   *
   * @example
   * const unsub = config.onChange('maxEntries', (next) => store.setMaxEntries(next));
   */
  onChange<K extends ConfigKey>(key: K, callback: ChangeCallback<K>): () => void {
    const dispatcher: ChangeDispatcher = (changes, oldValues) => {
      const newVal = changes[key];
      const oldVal = oldValues[key];
      if (newVal !== undefined && oldVal !== undefined) callback(newVal, oldVal);
    };

    let listeners = this.keyListeners.get(key);
    if (!listeners) {
      listeners = new Set();
      this.keyListeners.set(key, listeners);
    }
    listeners.add(dispatcher);
    return () => {
      this.keyListeners.get(key)?.delete(dispatcher);
    };
  }

  /**
   * Subscribe to any config change. Callback receives the changed keys/values.
   * Returns an unsubscribe function.
   */
  onAnyChange(callback: AnyChangeCallback): () => void {
    this.anyListeners.add(callback);
    return () => {
      this.anyListeners.delete(callback);
    };
  }

  private notifyChange(changes: Partial<ClipkeepConfigParsed>, oldValues: Partial<ClipkeepConfigParsed>): void {
    for (const [key, listeners] of this.keyListeners) {
      if (!(key in changes)) continue;
      for (const dispatch of listeners) {
        try {
          dispatch(changes, oldValues);
        } catch (err) {
          log.error(`Config onChange listener error for key "${key}":`, err);
        }
      }
    }

    for (const cb of this.anyListeners) {
      try {
        cb(changes);
      } catch (err) {
        log.error('Config onAnyChange listener error:', err);
      }
    }

    this.emit('change', changes);
  }

  // ────────────── Shutdown ──────────────

  async shutdown(): Promise<void> {
    await this.forceSave();
    this.keyListeners.clear();
    this.anyListeners.clear();
    this.removeAllListeners();
  }
}
