import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

vi.mock('../src/main/services/logger', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(),
  })),
}));

import { DatabaseService, SCHEMA_VERSION } from '../src/main/services/database-service';
import { ClipkeepError, ErrorCode } from '../src/shared/types/errors';

function insertText(svc: DatabaseService, hash: string, text: string, recency: number): number {
  const info = svc
    .getDb()
    .prepare(
      `INSERT INTO clipboard_entries (content_type, text_content, display_text, content_hash, created_at, last_seen_at, recency)
       VALUES ('text', ?, ?, ?, '2026-01-01T00:00:00.000Z', '2026-01-01T00:00:00.000Z', ?)`,
    )
    .run(text, text, hash, recency);
  return Number(info.lastInsertRowid);
}

function ftsIds(svc: DatabaseService, match: string): number[] {
  const rows = svc.getDb().prepare('SELECT rowid FROM clipboard_fts WHERE clipboard_fts MATCH ?').all(match) as Array<{
    rowid: number;
  }>;
  return rows.map((row) => row.rowid);
}

describe('DatabaseService', () => {
  let dir: string;
  let svc: DatabaseService;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'clipkeep-db-'));
    svc = new DatabaseService(path.join(dir, 'nested', 'clipkeep.db'));
  });

  afterEach(() => {
    svc.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  // ─── Lifecycle ───

  it('creates the parent directory and applies the schema', () => {
    svc.initialize();
    expect(svc.isOpen()).toBe(true);
    expect(fs.existsSync(path.join(dir, 'nested', 'clipkeep.db'))).toBe(true);
    expect(svc.getSchemaVersion()).toBe(SCHEMA_VERSION);
  });

  it('enables WAL journaling', () => {
    svc.initialize();
    expect(svc.getDb().pragma('journal_mode', { simple: true })).toBe('wal');
  });

  it('is idempotent', () => {
    svc.initialize();
    const db = svc.getDb();
    svc.initialize();
    expect(svc.getDb()).toBe(db);
  });

  it('does not re-run migrations on reopen', () => {
    svc.initialize();
    insertText(svc, 'h1', 'kept across restarts', 1);
    svc.close();

    svc.initialize();
    const rows = svc.getDb().prepare('SELECT version FROM schema_version').all();
    expect(rows).toEqual([{ version: 1 }, { version: 2 }]);
    expect(svc.getDb().prepare('SELECT COUNT(*) AS n FROM clipboard_entries').get()).toEqual({ n: 1 });
  });

  it('raises INVALID_STATE when used before initialize', () => {
    try {
      svc.getDb();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ClipkeepError);
      expect(ClipkeepError.isClipkeepError(err) && err.code).toBe(ErrorCode.INVALID_STATE);
    }
  });

  it('raises INVALID_STATE after close', () => {
    svc.initialize();
    svc.close();
    expect(svc.isOpen()).toBe(false);
    expect(() => svc.getDb()).toThrow(ClipkeepError);
  });

  it('raises a fatal DB_CONNECTION_ERROR when the file cannot be opened', () => {
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory');
    const broken = new DatabaseService(path.join(blocker, 'clipkeep.db'));
    try {
      broken.initialize();
      expect.unreachable();
    } catch (err) {
      expect(ClipkeepError.isClipkeepError(err) && err.code).toBe(ErrorCode.DB_CONNECTION_ERROR);
      expect(ClipkeepError.isClipkeepError(err) && err.severity).toBe('fatal');
    }
    expect(broken.isOpen()).toBe(false);
  });

  it('works in memory', () => {
    const mem = new DatabaseService(':memory:');
    mem.initialize();
    expect(mem.getSchemaVersion()).toBe(SCHEMA_VERSION);
    mem.close();
  });

  // ─── Statements and transactions ───

  it('caches prepared statements', () => {
    svc.initialize();
    const sql = 'SELECT COUNT(*) AS n FROM clipboard_entries';
    expect(svc.statement(sql)).toBe(svc.statement(sql));
  });

  it('rolls back every write when the transaction throws', () => {
    svc.initialize();
    expect(() =>
      svc.transaction(() => {
        insertText(svc, 'h1', 'first', 1);
        insertText(svc, 'h1', 'duplicate hash', 2);
      }),
    ).toThrow();
    expect(svc.getDb().prepare('SELECT COUNT(*) AS n FROM clipboard_entries').get()).toEqual({ n: 0 });
  });

  it('rejects unknown content types', () => {
    svc.initialize();
    expect(() =>
      svc
        .getDb()
        .prepare(
          `INSERT INTO clipboard_entries (content_type, display_text, content_hash, created_at, last_seen_at, recency)
           VALUES ('video', 'x', 'h', 'now', 'now', 1)`,
        )
        .run(),
    ).toThrow();
  });

  it('defaults new rows to unpinned', () => {
    svc.initialize();
    const id = insertText(svc, 'h1', 'plain', 1);
    expect(svc.getDb().prepare('SELECT pinned FROM clipboard_entries WHERE id = ?').get(id)).toEqual({ pinned: 0 });
  });

  // ─── Full-text index ───

  it('indexes inserts and forgets deletes', () => {
    svc.initialize();
    const id = insertText(svc, 'h1', 'quarterly roadmap', 1);
    expect(ftsIds(svc, '"roadmap"')).toEqual([id]);

    svc.getDb().prepare('DELETE FROM clipboard_entries WHERE id = ?').run(id);
    expect(ftsIds(svc, '"roadmap"')).toEqual([]);
  });

  it('reindexes content updates', () => {
    svc.initialize();
    const id = insertText(svc, 'h1', 'old words', 1);
    svc.getDb().prepare("UPDATE clipboard_entries SET display_text = 'new words', text_content = 'new words' WHERE id = ?").run(id);
    expect(ftsIds(svc, '"old"')).toEqual([]);
    expect(ftsIds(svc, '"new"')).toEqual([id]);
  });

  it('keeps the index intact across recency bumps', () => {
    svc.initialize();
    const id = insertText(svc, 'h1', 'stable text', 1);
    svc.getDb().prepare('UPDATE clipboard_entries SET recency = 5, last_seen_at = ? WHERE id = ?').run('later', id);
    expect(ftsIds(svc, '"stable"')).toEqual([id]);
  });

  it('folds diacritics when matching', () => {
    svc.initialize();
    const id = insertText(svc, 'h1', 'café crème', 1);
    expect(ftsIds(svc, '"cafe"')).toEqual([id]);
  });
});
