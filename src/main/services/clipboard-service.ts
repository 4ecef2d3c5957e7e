/**
 * Clipboard history service, the query surface a menu-bar UI talks to.
 *
 * Features:
 * - Background clipboard monitoring (change-counter polling)
 * - SQLite-backed history with FTS5 full-text search
 * - Deduplication by content fingerprint, recency bumps, size-bounded retention
 * - Restore: writes an entry's exact payload back to the clipboard
 *
 * Emits 'change' after every capture and every mutation.
 *
 * @module clipboard-service
 */

import { EventEmitter } from 'events';
import { createLogger } from './logger';
import type { HistoryStore } from './history-store';
import type { ArtifactStore } from './artifact-store';
import type { CaptureEvent, ClipboardMonitor } from './clipboard-monitor';
import type { ClipboardEntry, ClipboardSink, ClipboardStatus, RawCapture, TickOutcome } from '@shared/types';
import { ClipkeepError, ErrorCode } from '@shared/types/errors';

const log = createLogger('Clipboard');

export type ChangeReason = 'capture' | 'delete' | 'clear' | 'restore' | 'pin';

export interface ChangeEvent {
  reason: ChangeReason;
  /** Entry the change is about; absent for clear */
  id?: number;
}

export class ClipboardService extends EventEmitter {
  private readonly onCapture = (event: CaptureEvent): void => {
    this.emitChange({ reason: 'capture', id: event.id });
  };

  constructor(
    private readonly store: HistoryStore,
    private readonly artifacts: ArtifactStore,
    private readonly monitor: ClipboardMonitor,
    private readonly sink: ClipboardSink,
    private menuDisplayCount = 10,
  ) {
    super();
    this.monitor.on('change', this.onCapture);
  }

  // ─── Monitoring ───

  start(): void {
    this.monitor.start();
  }

  stop(): void {
    this.monitor.stop();
  }

  /** Stop monitoring and detach from the monitor */
  shutdown(): void {
    this.stop();
    this.monitor.off('change', this.onCapture);
    log.info('Clipboard service shut down');
  }

  /** Capture the current clipboard content regardless of the change counter */
  captureNow(): TickOutcome {
    return this.monitor.captureNow();
  }

  // ─── Queries ───

  search(text: string, limit: number): ClipboardEntry[] {
    return this.store.search(text, limit);
  }

  recent(limit: number): ClipboardEntry[] {
    return this.store.recent(limit);
  }

  /** The entries a dropdown shows */
  menu(): ClipboardEntry[] {
    return this.store.recent(this.menuDisplayCount);
  }

  setMenuDisplayCount(count: number): void {
    this.menuDisplayCount = count;
  }

  getEntry(id: number): ClipboardEntry | null {
    return this.store.get(id);
  }

  getStatus(): ClipboardStatus {
    const startedAt = this.monitor.getStartedAt();
    return {
      monitoring: this.monitor.isRunning(),
      totalEntries: this.store.count(),
      maxEntries: this.store.getMaxEntries(),
      lastChangeCount: this.monitor.getLastChangeCount(),
      startedAt: startedAt?.toISOString(),
    };
  }

  // ─── Mutations ───

  delete(id: number): boolean {
    const removed = this.store.delete(id);
    if (removed) this.emitChange({ reason: 'delete', id });
    return removed;
  }

  /** Returns the new pin state, or null for an unknown id */
  togglePin(id: number): boolean | null {
    const pinned = this.store.togglePin(id);
    if (pinned !== null) this.emitChange({ reason: 'pin', id });
    return pinned;
  }

  clearAll(): number {
    const removed = this.store.clearAll();
    this.emitChange({ reason: 'clear' });
    return removed;
  }

  /**
   * Put an entry's original payload back on the clipboard and move it to the
   * front. Returns false for an unknown id.
   */
  restore(id: number): boolean {
    const entry = this.store.get(id);
    if (!entry) return false;

    const capture = this.toCapture(entry);
    try {
      this.sink.write(capture);
    } catch (err) {
      throw ClipkeepError.from(err, ErrorCode.FS_WRITE_ERROR, { id });
    }

    this.store.touch(id);
    try {
      this.monitor.syncChangeCount();
    } catch (err) {
      // The next tick sees the restored payload and bumps the same entry
      log.warn('Could not read change counter after restore:', err);
    }

    log.debug(`Restored ${entry.contentType} entry #${id}`);
    this.emitChange({ reason: 'restore', id });
    return true;
  }

  // ─── Helpers ───

  private toCapture(entry: ClipboardEntry): RawCapture {
    switch (entry.contentType) {
      case 'text':
        if (entry.text === null) {
          throw new ClipkeepError(`Text of entry #${entry.id} was withheld`, ErrorCode.INVALID_STATE, {
            context: { id: entry.id },
          });
        }
        return { kind: 'text', text: entry.text };
      case 'file':
        return { kind: 'files', paths: [...entry.paths] };
      case 'image':
        if (entry.artifactMissing) {
          throw new ClipkeepError(`Image for entry #${entry.id} is unavailable`, ErrorCode.INTEGRITY_VIOLATION, {
            context: { id: entry.id, artifactPath: entry.artifactPath },
          });
        }
        return { kind: 'image', data: this.artifacts.read(entry.artifactPath), format: entry.imageFormat };
    }
  }

  private emitChange(event: ChangeEvent): void {
    this.emit('change', event);
  }
}
