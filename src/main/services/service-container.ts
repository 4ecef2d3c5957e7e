/**
 * ServiceContainer: lightweight DI container for the clipkeep pipeline.
 *
 * Provides typed access, centralized init, and ordered graceful shutdown.
 *
 * Usage:
 *   const container = new ServiceContainer({ dataDir, source, sink });
 *   container.init();
 *   container.get('clipboard').start();
 *   ...
 *   await container.shutdown();
 */

import * as path from 'path';
import { addLogSink, createFileSink, createLogger, setLogLevel } from './logger';
import { ConfigService } from './config';
import { DatabaseService } from './database-service';
import { ArtifactStore } from './artifact-store';
import { HistoryStore } from './history-store';
import { ContentClassifier } from './content-classifier';
import { ClipboardMonitor } from './clipboard-monitor';
import { ClipboardService } from './clipboard-service';
import { DB_FILE_NAME, IMAGE_DIR_NAME, LOG_FILE_NAME } from '@shared/constants';
import type { ClipboardSink, ClipboardSource } from '@shared/types';
import { ClipkeepError, ErrorCode } from '@shared/types/errors';

const log = createLogger('Container');

// ─── Service Map: typed registry of all services ───

export interface ServiceMap {
  config: ConfigService;
  database: DatabaseService;
  artifacts: ArtifactStore;
  history: HistoryStore;
  classifier: ContentClassifier;
  monitor: ClipboardMonitor;
  clipboard: ClipboardService;
}

export type ServiceKey = keyof ServiceMap;

export interface ContainerOptions {
  dataDir: string;
  source: ClipboardSource;
  sink: ClipboardSink;
  /** Write the diagnostics log file (default true) */
  fileLog?: boolean;
}

export class ServiceContainer {
  private services: Partial<ServiceMap> = {};
  private initialized = false;
  private disposers: Array<() => void> = [];

  constructor(private readonly options: ContainerOptions) {}

  /**
   * Get a registered service by key (typed).
   * Throws if the container hasn't been initialized yet or service doesn't exist.
   */
  get<K extends ServiceKey>(key: K): ServiceMap[K] {
    if (!this.initialized) {
      throw new ClipkeepError('ServiceContainer not initialized, call init() first', ErrorCode.INVALID_STATE);
    }
    const svc = this.services[key];
    if (!svc) {
      throw new ClipkeepError(`Service '${key}' not found in container`, ErrorCode.INVALID_STATE);
    }
    return svc;
  }

  has(key: ServiceKey): boolean {
    return this.services[key] !== undefined;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Initialize all services in dependency order.
   */
  init(): void {
    if (this.initialized) {
      throw new ClipkeepError('ServiceContainer already initialized', ErrorCode.INVALID_STATE);
    }

    const t0 = Date.now();
    try {
      this.wire();
    } catch (err) {
      log.error('Initialization failed, releasing partial services:', err);
      this.trySync('database', (s) => s.close());
      this.release();
      throw err;
    }

    this.initialized = true;
    log.info(`All services initialized in ${Date.now() - t0}ms`);
  }

  private wire(): void {
    const { dataDir, source, sink } = this.options;

    // ── Phase 1: Config and diagnostics ──
    const config = new ConfigService(dataDir);
    this.set('config', config);
    setLogLevel(config.get('logLevel'));
    if (this.options.fileLog !== false) {
      this.disposers.push(addLogSink(createFileSink(path.join(dataDir, LOG_FILE_NAME))));
    }
    log.info(`Initializing services in ${dataDir}...`);

    // ── Phase 2: Storage ──
    const database = new DatabaseService(path.join(dataDir, DB_FILE_NAME));
    database.initialize();
    this.set('database', database);

    const artifacts = new ArtifactStore(path.join(dataDir, IMAGE_DIR_NAME));
    artifacts.ensureDir();
    this.set('artifacts', artifacts);

    const history = new HistoryStore(database, artifacts, { maxEntries: config.get('maxEntries') });
    history.pruneOrphanArtifacts();
    history.enforceCap();
    this.set('history', history);

    // ── Phase 3: Capture pipeline ──
    const classifier = new ContentClassifier({
      previewLength: config.get('previewLength'),
      maxTextSize: config.get('maxTextSize'),
      maxImageSize: config.get('maxImageSize'),
    });
    this.set('classifier', classifier);

    const monitor = new ClipboardMonitor(source, classifier, history, {
      pollIntervalMs: config.get('pollIntervalMs'),
      redactSensitive: config.get('redactSensitive'),
      previewLength: config.get('previewLength'),
    });
    this.set('monitor', monitor);

    const clipboard = new ClipboardService(history, artifacts, monitor, sink, config.get('menuDisplayCount'));
    this.set('clipboard', clipboard);

    // ── Phase 4: Live config wiring ──
    this.disposers.push(
      config.onChange('logLevel', (level) => setLogLevel(level)),
      config.onChange('pollIntervalMs', (pollIntervalMs) => monitor.updateOptions({ pollIntervalMs })),
      config.onChange('redactSensitive', (redactSensitive) => monitor.updateOptions({ redactSensitive })),
      config.onChange('previewLength', (previewLength) => {
        monitor.updateOptions({ previewLength });
        classifier.updateOptions({ previewLength });
      }),
      config.onChange('maxTextSize', (maxTextSize) => classifier.updateOptions({ maxTextSize })),
      config.onChange('maxImageSize', (maxImageSize) => classifier.updateOptions({ maxImageSize })),
      config.onChange('menuDisplayCount', (count) => clipboard.setMenuDisplayCount(count)),
      config.onChange('maxEntries', (maxEntries) => {
        history.setMaxEntries(maxEntries);
        history.enforceCap();
      }),
    );
  }

  /**
   * Graceful shutdown. Stops services in reverse dependency order.
   */
  async shutdown(): Promise<void> {
    if (!this.initialized) return;

    log.info('Graceful shutdown started');
    const t0 = Date.now();

    // ── Phase 1: Stop capturing ──
    this.trySync('clipboard', (s) => s.shutdown());

    // ── Phase 2: Persist config ──
    await this.tryAsync('config', (s) => s.shutdown());

    // ── Phase 3: Close database (must be last) ──
    this.trySync('database', (s) => s.close());

    log.info(`Graceful shutdown completed in ${Date.now() - t0}ms`);
    this.release();
  }

  /** Detach config listeners and log sinks, forget every service */
  private release(): void {
    for (const dispose of this.disposers.splice(0)) {
      dispose();
    }
    this.services = {};
    this.initialized = false;
  }

  // ─── Private helpers ───

  private set<K extends ServiceKey>(key: K, service: ServiceMap[K]): void {
    this.services[key] = service;
  }

  /** Safely call a sync method on a service, logging errors. */
  private trySync<K extends ServiceKey>(key: K, fn: (service: ServiceMap[K]) => void): void {
    const service = this.services[key];
    if (!service) return;
    try {
      fn(service);
    } catch (err) {
      log.error(`${key} shutdown error:`, err);
    }
  }

  /** Safely call an async method on a service, logging errors. */
  private async tryAsync<K extends ServiceKey>(key: K, fn: (service: ServiceMap[K]) => Promise<void>): Promise<void> {
    const service = this.services[key];
    if (!service) return;
    try {
      await fn(service);
    } catch (err) {
      log.error(`${key} shutdown error:`, err);
    }
  }
}
