/**
 * HistoryStore: deduplicated, size-bounded clipboard history on SQLite.
 *
 * Each mutation is one transaction. A repeated fingerprint bumps the existing
 * row instead of inserting; inserts past maxEntries evict the least recently
 * seen rows together with their image artifacts, unpinned rows first.
 *
 * Listings (recent, search) never carry the raw text of a sensitive entry;
 * get() does, for restore.
 */

import { z } from 'zod';
import type { DatabaseService } from './database-service';
import type { ArtifactStore } from './artifact-store';
import { createLogger } from './logger';
import { MASK, MISSING_IMAGE_LABEL } from '@shared/constants';
import { ClipkeepError, ErrorCode } from '@shared/types/errors';
import type {
  ClipboardEntry,
  EntryCandidate,
  ImageFormat,
  SensitiveKind,
  UpsertResult,
} from '@shared/types';

const log = createLogger('HistoryStore');

// ─── Row types ───

interface EntryRow {
  id: number;
  content_type: string;
  text_content: string | null;
  file_paths: string | null;
  artifact_path: string | null;
  image_format: string | null;
  image_width: number | null;
  image_height: number | null;
  display_text: string;
  is_sensitive: number;
  masked_preview: string | null;
  sensitive_kinds: string;
  content_hash: string;
  byte_size: number;
  source_app: string | null;
  created_at: string;
  last_seen_at: string;
  recency: number;
  pinned: number;
}

export interface HistoryStoreOptions {
  maxEntries: number;
  /** Clock for bumps on restore */
  now?: () => Date;
}

const FilePathsSchema = z.array(z.string());

const IMAGE_FORMATS: readonly ImageFormat[] = ['png', 'jpeg', 'gif', 'tiff'];
const SENSITIVE_KINDS: readonly SensitiveKind[] = [
  'api_key',
  'password',
  'ssn',
  'credit_card',
  'private_key',
  'certificate',
  'token',
];

function isImageFormat(value: string | null): value is ImageFormat {
  return IMAGE_FORMATS.some((f) => f === value);
}

function parseSensitiveKinds(value: string): SensitiveKind[] {
  return value
    .split(',')
    .map((kind) => SENSITIVE_KINDS.find((known) => known === kind))
    .filter((kind): kind is SensitiveKind => kind !== undefined);
}

function parseFilePaths(id: number, raw: string | null): string[] {
  try {
    const parsed = FilePathsSchema.safeParse(JSON.parse(raw ?? '[]'));
    if (parsed.success) return parsed.data;
    log.warn(`Entry ${id} has a malformed file list`);
  } catch (err) {
    log.warn(`Entry ${id} has an unreadable file list:`, err);
  }
  return [];
}

/**
 * Turn free text into an FTS5 MATCH expression: every token is quoted (so
 * operators and punctuation are literal) and prefix-matched. Returns null
 * when no token has a searchable character.
 */
export function buildMatchQuery(query: string): string | null {
  const tokens = query
    .split(/\s+/)
    .map((token) => token.replace(/"/g, ''))
    .filter((token) => /[\p{L}\p{N}]/u.test(token));
  if (tokens.length === 0) return null;
  return tokens.map((token) => `"${token}"*`).join(' ');
}

export class HistoryStore {
  private maxEntries: number;
  private readonly now: () => Date;

  constructor(
    private readonly db: DatabaseService,
    private readonly artifacts: ArtifactStore,
    options: HistoryStoreOptions,
  ) {
    this.maxEntries = options.maxEntries;
    this.now = options.now ?? (() => new Date());
  }

  setMaxEntries(maxEntries: number): void {
    this.maxEntries = maxEntries;
  }

  getMaxEntries(): number {
    return this.maxEntries;
  }

  // ─── Writes ───

  /**
   * Insert a candidate, or bump the entry that already holds its fingerprint.
   */
  upsert(candidate: EntryCandidate): UpsertResult {
    const written: { artifact: string | null } = { artifact: null };
    const evictedArtifacts: string[] = [];

    let result: UpsertResult;
    try {
      result = this.db.transaction(() => {
        const seenAt = candidate.capturedAt.toISOString();
        const existing = this.db
          .statement('SELECT id, artifact_path FROM clipboard_entries WHERE content_hash = ?')
          .get(candidate.contentHash) as { id: number; artifact_path: string | null } | undefined;

        if (existing) {
          const artifactLost = !existing.artifact_path || !this.artifacts.exists(existing.artifact_path);
          if (candidate.contentType === 'image' && artifactLost) {
            const artifactPath = this.artifacts.persist(candidate.contentHash, candidate.format, candidate.data);
            written.artifact = artifactPath;
            this.db
              .statement('UPDATE clipboard_entries SET artifact_path = ? WHERE id = ?')
              .run(artifactPath, existing.id);
            log.info(`Rewrote missing artifact for entry ${existing.id}`);
          }
          this.db
            .statement('UPDATE clipboard_entries SET last_seen_at = ?, recency = ? WHERE id = ?')
            .run(seenAt, this.nextRecency(), existing.id);
          return { id: existing.id, bumped: true, evictedIds: [] };
        }

        let artifactPath: string | null = null;
        if (candidate.contentType === 'image') {
          artifactPath = this.artifacts.persist(candidate.contentHash, candidate.format, candidate.data);
          written.artifact = artifactPath;
        }

        const info = this.db
          .statement(
            `INSERT INTO clipboard_entries (
              content_type, text_content, file_paths, artifact_path, image_format, image_width, image_height,
              display_text, is_sensitive, masked_preview, sensitive_kinds, content_hash, byte_size, source_app,
              created_at, last_seen_at, recency
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
          )
          .run(
            candidate.contentType,
            candidate.contentType === 'text' ? candidate.text : null,
            candidate.contentType === 'file' ? JSON.stringify(candidate.paths) : null,
            artifactPath,
            candidate.contentType === 'image' ? candidate.format : null,
            candidate.contentType === 'image' ? candidate.width : null,
            candidate.contentType === 'image' ? candidate.height : null,
            candidate.displayText,
            candidate.isSensitive ? 1 : 0,
            candidate.maskedPreview,
            candidate.kinds.join(','),
            candidate.contentHash,
            candidate.byteSize,
            candidate.sourceApp ?? null,
            seenAt,
            seenAt,
            this.nextRecency(),
          );

        const evictedIds = this.evictOverflow(evictedArtifacts);
        return { id: Number(info.lastInsertRowid), bumped: false, evictedIds };
      });
    } catch (err) {
      if (written.artifact) {
        this.discardArtifact(written.artifact);
      }
      throw ClipkeepError.from(err, ErrorCode.STORAGE_IO_ERROR, { contentHash: candidate.contentHash });
    }

    for (const artifactPath of evictedArtifacts) {
      this.discardArtifact(artifactPath);
    }
    if (result.evictedIds.length > 0) {
      log.debug(`Evicted ${result.evictedIds.length} entr(y/ies) past the cap of ${this.maxEntries}`);
    }
    return result;
  }

  /**
   * Evict the least recently seen entries beyond the cap. Used after the cap
   * is lowered; inserts enforce it themselves.
   */
  enforceCap(): number[] {
    const evictedArtifacts: string[] = [];
    let evictedIds: number[];
    try {
      evictedIds = this.db.transaction(() => this.evictOverflow(evictedArtifacts));
    } catch (err) {
      throw ClipkeepError.from(err, ErrorCode.STORAGE_IO_ERROR);
    }

    for (const artifactPath of evictedArtifacts) {
      this.discardArtifact(artifactPath);
    }
    if (evictedIds.length > 0) {
      log.info(`Evicted ${evictedIds.length} entr(y/ies) to fit the cap of ${this.maxEntries}`);
    }
    return evictedIds;
  }

  /**
   * Move an entry to the front without changing its content. Used on restore.
   */
  touch(id: number): boolean {
    try {
      const info = this.db
        .statement('UPDATE clipboard_entries SET last_seen_at = ?, recency = ? WHERE id = ?')
        .run(this.now().toISOString(), this.nextRecency(), id);
      return info.changes > 0;
    } catch (err) {
      throw ClipkeepError.from(err, ErrorCode.STORAGE_IO_ERROR, { id });
    }
  }

  /**
   * Flip an entry's pin. Pinned entries are evicted only once every entry is
   * pinned. Returns the new state, or null for an unknown id.
   */
  togglePin(id: number): boolean | null {
    try {
      return this.db.transaction(() => {
        const info = this.db.statement('UPDATE clipboard_entries SET pinned = 1 - pinned WHERE id = ?').run(id);
        if (info.changes === 0) return null;
        const row = this.db.statement('SELECT pinned FROM clipboard_entries WHERE id = ?').get(id) as {
          pinned: number;
        };
        return row.pinned === 1;
      });
    } catch (err) {
      throw ClipkeepError.from(err, ErrorCode.STORAGE_IO_ERROR, { id });
    }
  }

  /**
   * Remove one entry and its artifact. Unknown ids are a no-op returning false.
   */
  delete(id: number): boolean {
    let row: { artifact_path: string | null } | undefined;
    try {
      row = this.db.transaction(() => {
        const found = this.db.statement('SELECT artifact_path FROM clipboard_entries WHERE id = ?').get(id) as
          | { artifact_path: string | null }
          | undefined;
        if (found) {
          this.db.statement('DELETE FROM clipboard_entries WHERE id = ?').run(id);
        }
        return found;
      });
    } catch (err) {
      throw ClipkeepError.from(err, ErrorCode.STORAGE_IO_ERROR, { id });
    }

    if (!row) return false;
    if (row.artifact_path) {
      this.discardArtifact(row.artifact_path);
    }
    return true;
  }

  /**
   * Remove every entry and every artifact. Returns the number of entries removed.
   */
  clearAll(): number {
    let removed: number;
    try {
      removed = this.db.transaction(() => this.db.statement('DELETE FROM clipboard_entries').run().changes);
    } catch (err) {
      throw ClipkeepError.from(err, ErrorCode.STORAGE_IO_ERROR);
    }

    for (const artifactPath of this.artifacts.list().values()) {
      this.discardArtifact(artifactPath);
    }
    log.info(`Cleared ${removed} entr(y/ies)`);
    return removed;
  }

  /**
   * Delete artifact files that no entry owns. Run once at open.
   */
  pruneOrphanArtifacts(): number {
    const rows = this.db
      .statement("SELECT content_hash FROM clipboard_entries WHERE content_type = 'image'")
      .all() as Array<{ content_hash: string }>;
    return this.artifacts.pruneOrphans(new Set(rows.map((row) => row.content_hash)));
  }

  // ─── Reads ───

  /** Full entry, raw payload included */
  get(id: number): ClipboardEntry | null {
    const row = this.query(() => this.db.statement('SELECT * FROM clipboard_entries WHERE id = ?').get(id)) as
      | EntryRow
      | undefined;
    return row ? this.rowToEntry(row, true) : null;
  }

  count(): number {
    const row = this.query(() => this.db.statement('SELECT COUNT(*) AS n FROM clipboard_entries').get()) as {
      n: number;
    };
    return row.n;
  }

  /** Most recently seen first */
  recent(limit: number): ClipboardEntry[] {
    const rows = this.query(() =>
      this.db.statement('SELECT * FROM clipboard_entries ORDER BY recency DESC LIMIT ?').all(limit),
    ) as EntryRow[];
    return rows.map((row) => this.rowToEntry(row, false));
  }

  /**
   * Full-text search, best match first; equally relevant entries come most
   * recent first. A blank query lists recent entries.
   */
  search(query: string, limit: number): ClipboardEntry[] {
    const match = buildMatchQuery(query);
    if (!match) return this.recent(limit);

    const rows = this.query(() =>
      this.db
        .statement(
          `SELECT e.* FROM clipboard_fts
           JOIN clipboard_entries e ON e.id = clipboard_fts.rowid
           WHERE clipboard_fts MATCH ?
           ORDER BY bm25(clipboard_fts), e.recency DESC
           LIMIT ?`,
        )
        .all(match, limit),
    ) as EntryRow[];
    return rows.map((row) => this.rowToEntry(row, false));
  }

  // ─── Helpers ───

  private query<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw ClipkeepError.from(err, ErrorCode.STORAGE_IO_ERROR);
    }
  }

  private nextRecency(): number {
    const row = this.db.statement('SELECT COALESCE(MAX(recency), 0) + 1 AS next FROM clipboard_entries').get() as {
      next: number;
    };
    return row.next;
  }

  /** Delete rows beyond the cap, unpinned and least recently seen first, collecting their artifacts */
  private evictOverflow(evictedArtifacts: string[]): number[] {
    const { n } = this.db.statement('SELECT COUNT(*) AS n FROM clipboard_entries').get() as { n: number };
    const overflow = n - this.maxEntries;
    if (overflow <= 0) return [];

    const victims = this.db
      .statement('SELECT id, artifact_path FROM clipboard_entries ORDER BY pinned ASC, recency ASC LIMIT ?')
      .all(overflow) as Array<{ id: number; artifact_path: string | null }>;

    const remove = this.db.statement('DELETE FROM clipboard_entries WHERE id = ?');
    for (const victim of victims) {
      remove.run(victim.id);
      if (victim.artifact_path) evictedArtifacts.push(victim.artifact_path);
    }
    return victims.map((victim) => victim.id);
  }

  /** Leftovers are swept by pruneOrphanArtifacts at the next open */
  private discardArtifact(artifactPath: string): void {
    try {
      this.artifacts.remove(artifactPath);
    } catch (err) {
      log.warn(`Could not delete artifact ${artifactPath}:`, err);
    }
  }

  /** `withPayload` false withholds the raw text of sensitive entries */
  private rowToEntry(row: EntryRow, withPayload: boolean): ClipboardEntry {
    const isSensitive = row.is_sensitive === 1;
    const label = isSensitive ? (row.masked_preview ?? MASK) : row.display_text;
    const withheld = isSensitive && !withPayload;
    const base = {
      id: row.id,
      displayText: withheld ? label : row.display_text,
      isSensitive,
      maskedPreview: row.masked_preview,
      sensitiveKinds: parseSensitiveKinds(row.sensitive_kinds),
      label,
      pinned: row.pinned === 1,
      contentHash: row.content_hash,
      byteSize: row.byte_size,
      sourceApp: row.source_app ?? undefined,
      createdAt: row.created_at,
      lastSeenAt: row.last_seen_at,
    };

    switch (row.content_type) {
      case 'text':
        return { ...base, contentType: 'text', text: withheld ? null : (row.text_content ?? '') };
      case 'file':
        return { ...base, contentType: 'file', paths: parseFilePaths(row.id, row.file_paths) };
      case 'image': {
        const artifactPath = row.artifact_path ?? '';
        const artifactMissing = !artifactPath || !this.artifacts.exists(artifactPath);
        if (artifactMissing) {
          log.warn(`Integrity violation: artifact for entry ${row.id} is missing (${artifactPath || 'no path'})`);
        }
        const displayText = artifactMissing ? MISSING_IMAGE_LABEL : row.display_text;
        return {
          ...base,
          displayText,
          label: displayText,
          contentType: 'image',
          artifactPath,
          imageFormat: isImageFormat(row.image_format) ? row.image_format : 'png',
          width: row.image_width,
          height: row.image_height,
          artifactMissing,
        };
      }
      default:
        throw new ClipkeepError(`Entry ${row.id} has unknown content type ${row.content_type}`, ErrorCode.INTEGRITY_VIOLATION, {
          context: { id: row.id },
        });
    }
  }
}
