/**
 * DatabaseService: SQLite connection for the clipboard history.
 *
 * better-sqlite3 (synchronous, in-process) in WAL mode. Owns pragmas, schema
 * migrations and a prepared-statement cache; HistoryStore owns the queries.
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import { createLogger } from './logger';
import { ClipkeepError, ErrorCode } from '@shared/types/errors';

const log = createLogger('DatabaseService');

// ─── Schema version for migrations ───
export const SCHEMA_VERSION = 2;

export class DatabaseService {
  private db: Database.Database | null = null;
  private stmtCache: Map<string, Database.Statement> = new Map();

  constructor(private readonly dbPath: string) {}

  // ─── Lifecycle ───

  initialize(): void {
    if (this.db) return;

    try {
      if (this.dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      }

      log.info(`Opening database at ${this.dbPath}`);
      this.db = new Database(this.dbPath);

      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma('foreign_keys = ON');
      this.db.pragma('temp_store = MEMORY');
    } catch (err) {
      this.db = null;
      throw new ClipkeepError(`Cannot open database at ${this.dbPath}`, ErrorCode.DB_CONNECTION_ERROR, {
        severity: 'fatal',
        recoverable: false,
        originalError: err instanceof Error ? err : undefined,
      });
    }

    this.runMigrations();
    log.info('Database initialized successfully');
  }

  close(): void {
    if (this.db) {
      this.stmtCache.clear();
      try {
        this.db.pragma('wal_checkpoint(TRUNCATE)');
        this.db.close();
        log.info('Database closed');
      } catch (err) {
        log.error('Error closing database:', err);
      }
      this.db = null;
    }
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  getDb(): Database.Database {
    if (!this.db) {
      throw new ClipkeepError('Database is not open, call initialize() first', ErrorCode.INVALID_STATE);
    }
    return this.db;
  }

  /** Cached prepared statement */
  statement(sql: string): Database.Statement {
    let stmt = this.stmtCache.get(sql);
    if (!stmt) {
      stmt = this.getDb().prepare(sql);
      this.stmtCache.set(sql, stmt);
    }
    return stmt;
  }

  /**
   * Run `fn` inside one transaction: every write commits together or not at all.
   */
  transaction<T>(fn: () => T): T {
    return this.getDb().transaction(fn)();
  }

  getSchemaVersion(): number {
    const row = this.getDb().prepare('SELECT MAX(version) as v FROM schema_version').get() as { v: number | null };
    return row.v ?? 0;
  }

  // ─── Migrations ───

  private runMigrations(): void {
    const db = this.getDb();

    try {
      db.exec(`
        CREATE TABLE IF NOT EXISTS schema_version (
          version INTEGER PRIMARY KEY,
          applied_at TEXT NOT NULL DEFAULT (datetime('now'))
        );
      `);

      const version = this.getSchemaVersion();

      if (version < 1) {
        this.migrateV1(db);
      }
      if (version < 2) {
        this.migrateV2(db);
      }
    } catch (err) {
      throw new ClipkeepError('Database migration failed', ErrorCode.DB_MIGRATION_ERROR, {
        severity: 'fatal',
        recoverable: false,
        originalError: err instanceof Error ? err : undefined,
      });
    }
  }

  private migrateV1(db: Database.Database): void {
    log.info('Running migration v1: clipboard history schema');

    db.exec(`
      CREATE TABLE IF NOT EXISTS clipboard_entries (
        id              INTEGER PRIMARY KEY AUTOINCREMENT,
        content_type    TEXT NOT NULL CHECK(content_type IN ('text', 'image', 'file')),
        text_content    TEXT,
        file_paths      TEXT,
        artifact_path   TEXT,
        image_format    TEXT,
        image_width     INTEGER,
        image_height    INTEGER,
        display_text    TEXT NOT NULL,
        is_sensitive    INTEGER NOT NULL DEFAULT 0,
        masked_preview  TEXT,
        sensitive_kinds TEXT NOT NULL DEFAULT '',
        content_hash    TEXT NOT NULL UNIQUE,
        byte_size       INTEGER NOT NULL DEFAULT 0,
        source_app      TEXT,
        created_at      TEXT NOT NULL,
        last_seen_at    TEXT NOT NULL,
        recency         INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_clipboard_recency
        ON clipboard_entries(recency DESC);
      CREATE INDEX IF NOT EXISTS idx_clipboard_type
        ON clipboard_entries(content_type);

      -- FTS5 full-text search on display text and raw text
      CREATE VIRTUAL TABLE IF NOT EXISTS clipboard_fts USING fts5(
        display_text,
        text_content,
        content='clipboard_entries',
        content_rowid='id',
        tokenize='unicode61 remove_diacritics 2'
      );

      -- Triggers to keep FTS in sync
      CREATE TRIGGER IF NOT EXISTS clipboard_fts_ai AFTER INSERT ON clipboard_entries BEGIN
        INSERT INTO clipboard_fts(rowid, display_text, text_content)
        VALUES (new.id, new.display_text, new.text_content);
      END;

      CREATE TRIGGER IF NOT EXISTS clipboard_fts_ad AFTER DELETE ON clipboard_entries BEGIN
        INSERT INTO clipboard_fts(clipboard_fts, rowid, display_text, text_content)
        VALUES('delete', old.id, old.display_text, old.text_content);
      END;

      -- Bumps only touch recency columns and leave the index alone
      CREATE TRIGGER IF NOT EXISTS clipboard_fts_au AFTER UPDATE OF display_text, text_content ON clipboard_entries BEGIN
        INSERT INTO clipboard_fts(clipboard_fts, rowid, display_text, text_content)
        VALUES('delete', old.id, old.display_text, old.text_content);
        INSERT INTO clipboard_fts(rowid, display_text, text_content)
        VALUES (new.id, new.display_text, new.text_content);
      END;

      INSERT INTO schema_version (version) VALUES (1);
    `);

    log.info('Migration v1 complete');
  }

  private migrateV2(db: Database.Database): void {
    log.info('Running migration v2: pinned entries');

    db.exec(`
      ALTER TABLE clipboard_entries ADD COLUMN pinned INTEGER NOT NULL DEFAULT 0;

      CREATE INDEX IF NOT EXISTS idx_clipboard_eviction
        ON clipboard_entries(pinned, recency);

      INSERT INTO schema_version (version) VALUES (2);
    `);

    log.info('Migration v2 complete');
  }
}
