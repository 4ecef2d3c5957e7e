/**
 * ClipboardMonitor polls the clipboard change counter and runs each new
 * payload through classify → redact → fingerprint → store.
 *
 * States: `idle` between ticks, `captured` while a detected change is being
 * processed. Every pipeline error is caught here; a bad capture never stops
 * the loop.
 *
 * Events:
 *   'change'  (event: CaptureEvent)   an entry was inserted or bumped
 *   'failure' (error: ClipkeepError)  a capture or storage step failed
 */

import { EventEmitter } from 'events';
import { createLogger } from './logger';
import { PeriodicTask } from './poll-scheduler';
import { fingerprintCapture } from './fingerprint';
import { redact } from './redactor';
import type { ContentClassifier } from './content-classifier';
import type { HistoryStore } from './history-store';
import type {
  ClassifiedCapture,
  ClipboardSource,
  EntryCandidate,
  MonitorState,
  RawCapture,
  Sensitivity,
  TickOutcome,
  UpsertResult,
} from '@shared/types';
import { ClipkeepError, ErrorCode } from '@shared/types/errors';

const log = createLogger('Monitor');

export interface MonitorOptions {
  pollIntervalMs: number;
  redactSensitive: boolean;
  previewLength: number;
  /** Capture timestamp source */
  now?: () => Date;
}

export interface CaptureEvent extends UpsertResult {
  contentType: ClassifiedCapture['contentType'];
}

const NOT_SENSITIVE: Sensitivity = { isSensitive: false, maskedPreview: null, kinds: [] };

export class ClipboardMonitor extends EventEmitter {
  private state: MonitorState = 'idle';
  private lastChangeCount: number | null = null;
  private startedAt: Date | null = null;
  private options: Required<MonitorOptions>;
  private readonly task: PeriodicTask;

  constructor(
    private readonly source: ClipboardSource,
    private readonly classifier: ContentClassifier,
    private readonly store: HistoryStore,
    options: MonitorOptions,
  ) {
    super();
    this.options = { ...options, now: options.now ?? (() => new Date()) };
    this.task = new PeriodicTask('Clipboard poll', () => {
      this.tick();
    }, this.options.pollIntervalMs);
  }

  // ─── Lifecycle ───

  /**
   * Start polling. Whatever is on the clipboard at this point counts as seen
   * and is not captured.
   */
  start(): void {
    if (this.task.isRunning()) return;
    this.syncChangeCount();
    this.startedAt = this.options.now();
    this.task.start();
    log.info('Clipboard monitoring started');
  }

  stop(): void {
    if (!this.task.isRunning()) return;
    this.task.stop();
    this.startedAt = null;
    log.info('Clipboard monitoring stopped');
  }

  isRunning(): boolean {
    return this.task.isRunning();
  }

  getState(): MonitorState {
    return this.state;
  }

  getLastChangeCount(): number | null {
    return this.lastChangeCount;
  }

  getStartedAt(): Date | null {
    return this.startedAt;
  }

  updateOptions(options: Partial<Omit<MonitorOptions, 'now'>>): void {
    this.options = { ...this.options, ...options };
    if (options.pollIntervalMs !== undefined && options.pollIntervalMs !== this.task.getIntervalMs()) {
      this.task.setIntervalMs(options.pollIntervalMs);
    }
  }

  /**
   * Adopt the source's current counter as seen. Called after a restore has
   * written to the clipboard.
   */
  syncChangeCount(): void {
    try {
      this.lastChangeCount = this.source.changeCount();
    } catch (err) {
      throw ClipkeepError.from(err, ErrorCode.CAPTURE_ERROR);
    }
  }

  // ─── Polling ───

  /**
   * One poll: a no-op while the counter is unchanged, otherwise one full
   * pass of the capture pipeline.
   */
  tick(): TickOutcome {
    let count: number;
    try {
      count = this.source.changeCount();
    } catch (err) {
      return this.captureFailed(err);
    }

    if (count === this.lastChangeCount) return 'unchanged';
    return this.process(count);
  }

  /** Capture the current payload even when the counter has not moved */
  captureNow(): TickOutcome {
    let count: number;
    try {
      count = this.source.changeCount();
    } catch (err) {
      return this.captureFailed(err);
    }
    return this.process(count);
  }

  private process(count: number): TickOutcome {
    this.state = 'captured';
    try {
      let raw: RawCapture | null;
      try {
        raw = this.source.read();
      } catch (err) {
        // Counter stays unrecorded so the next tick retries
        return this.captureFailed(err);
      }

      let candidate: EntryCandidate | null;
      try {
        candidate = raw ? this.toCandidate(raw) : null;
      } catch (err) {
        const error = ClipkeepError.from(err, ErrorCode.CLASSIFICATION_DEGRADED);
        log.error('Dropping capture, processing failed:', error.message);
        this.lastChangeCount = count;
        this.emit('failure', error);
        return 'failed';
      }
      if (!candidate) {
        this.lastChangeCount = count;
        return 'skipped';
      }

      let result: UpsertResult;
      try {
        result = this.store.upsert(candidate);
      } catch (err) {
        const error = ClipkeepError.from(err, ErrorCode.STORAGE_IO_ERROR);
        log.error(`Dropping ${candidate.contentType} capture, store failed:`, error.message);
        this.lastChangeCount = count;
        this.emit('failure', error);
        return 'failed';
      }

      this.lastChangeCount = count;
      const event: CaptureEvent = { ...result, contentType: candidate.contentType };
      log.debug(`${result.bumped ? 'Bumped' : 'Captured'} ${candidate.contentType} entry #${result.id}`);
      this.emit('change', event);
      return result.bumped ? 'bumped' : 'captured';
    } finally {
      this.state = 'idle';
    }
  }

  private toCandidate(raw: RawCapture): EntryCandidate | null {
    const classified = this.classifier.classify(raw);
    if (!classified) return null;

    const sensitivity =
      classified.contentType === 'text' && this.options.redactSensitive
        ? redact(classified.text, { previewLength: this.options.previewLength })
        : NOT_SENSITIVE;

    return {
      ...classified,
      isSensitive: sensitivity.isSensitive,
      maskedPreview: sensitivity.maskedPreview,
      kinds: sensitivity.kinds,
      contentHash: fingerprintCapture(classified),
      capturedAt: this.options.now(),
    };
  }

  private captureFailed(err: unknown): TickOutcome {
    const error = ClipkeepError.from(err, ErrorCode.CAPTURE_ERROR);
    log.warn('Clipboard unreadable, retrying next tick:', error.message);
    this.emit('failure', error);
    return 'failed';
  }
}
