import { Injectable, OnModuleDestroy } from '@nestjs/common';
import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { join } from 'path';
import type {
  ClosureKind,
  SearchResult,
  SessionSummary,
  StoredSession,
  TranscriptLine,
} from '@scribeloop/shared-types';

export const DATABASE_FILE_NAME = 'scribeloop.db';

export interface NewSession {
  title?: string;
  deviceIndex: number | null;
  engine: string;
  language: string;
  createdAt?: number;
}

interface SessionRow {
  id: string;
  title: string;
  device_index: number | null;
  engine: string;
  language: string;
  created_at: number;
  ended_at: number | null;
}

interface LineRow {
  line_index: number;
  text: string;
  start_time_ms: number;
  end_time_ms: number;
  closure: string;
}

interface SummaryRow {
  id: string;
  title: string;
  created_at: number;
  ended_at: number | null;
  duration_ms: number;
  line_count: number;
}

interface SearchRow {
  session_id: string;
  title: string;
  created_at: number;
  excerpt: string | null;
}

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private db: Database.Database | null = null;
  private _dbPath = '';

  /** `dataDir` is created if missing; `':memory:'` opens a throwaway database */
  open(dataDir: string): void {
    this.db?.close();
    if (dataDir === ':memory:') {
      this._dbPath = dataDir;
    } else {
      mkdirSync(dataDir, { recursive: true });
      this._dbPath = join(dataDir, DATABASE_FILE_NAME);
    }
    this.db = new Database(this._dbPath);

    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');

    this.createTables(this.db);
  }

  get path(): string {
    return this._dbPath;
  }

  private get connection(): Database.Database {
    if (!this.db) throw new Error('Database is not open');
    return this.db;
  }

  private createTables(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        device_index INTEGER,
        engine TEXT NOT NULL,
        language TEXT NOT NULL,
        created_at INTEGER NOT NULL DEFAULT (unixepoch('now') * 1000),
        ended_at INTEGER
      );

      CREATE TABLE IF NOT EXISTS transcript_lines (
        session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
        line_index INTEGER NOT NULL,
        text TEXT NOT NULL,
        start_time_ms INTEGER NOT NULL,
        end_time_ms INTEGER NOT NULL,
        closure TEXT NOT NULL CHECK (closure IN ('natural', 'forced', 'flush')),
        PRIMARY KEY (session_id, line_index)
      );

      -- FTS5 for full-text search
      CREATE VIRTUAL TABLE IF NOT EXISTS sessions_fts USING fts5(
        title, content=sessions, content_rowid=rowid
      );

      CREATE VIRTUAL TABLE IF NOT EXISTS transcript_lines_fts USING fts5(
        text, content=transcript_lines, content_rowid=rowid
      );

      -- Triggers to keep FTS in sync
      CREATE TRIGGER IF NOT EXISTS sessions_ai AFTER INSERT ON sessions BEGIN
        INSERT INTO sessions_fts(rowid, title) VALUES (new.rowid, new.title);
      END;

      CREATE TRIGGER IF NOT EXISTS sessions_au AFTER UPDATE OF title ON sessions BEGIN
        INSERT INTO sessions_fts(sessions_fts, rowid, title) VALUES('delete', old.rowid, old.title);
        INSERT INTO sessions_fts(rowid, title) VALUES (new.rowid, new.title);
      END;

      CREATE TRIGGER IF NOT EXISTS sessions_ad AFTER DELETE ON sessions BEGIN
        INSERT INTO sessions_fts(sessions_fts, rowid, title) VALUES('delete', old.rowid, old.title);
      END;

      CREATE TRIGGER IF NOT EXISTS transcript_lines_ai AFTER INSERT ON transcript_lines BEGIN
        INSERT INTO transcript_lines_fts(rowid, text) VALUES (new.rowid, new.text);
      END;

      CREATE TRIGGER IF NOT EXISTS transcript_lines_ad AFTER DELETE ON transcript_lines BEGIN
        INSERT INTO transcript_lines_fts(transcript_lines_fts, rowid, text) VALUES('delete', old.rowid, old.text);
      END;

      CREATE INDEX IF NOT EXISTS idx_sessions_created_at ON sessions(created_at DESC);
    `);
  }

  // ── Sessions ──────────────────────────────────────────────────────

  createSession(data: NewSession): StoredSession {
    const createdAt = data.createdAt ?? Date.now();
    const session: StoredSession = {
      id: `session-${createdAt}-${Math.random().toString(36).slice(2, 8)}`,
      title: data.title ?? `Recording ${new Date(createdAt).toISOString().slice(0, 16).replace('T', ' ')}`,
      deviceIndex: data.deviceIndex,
      engine: data.engine,
      language: data.language,
      createdAt,
      endedAt: null,
      lines: [],
    };

    this.connection
      .prepare<[string, string, number | null, string, string, number]>(
        `INSERT INTO sessions (id, title, device_index, engine, language, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(session.id, session.title, session.deviceIndex, session.engine, session.language, createdAt);

    return session;
  }

  appendLine(sessionId: string, line: TranscriptLine): void {
    this.connection
      .prepare<[string, number, string, number, number, ClosureKind]>(
        `INSERT INTO transcript_lines (session_id, line_index, text, start_time_ms, end_time_ms, closure)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(sessionId, line.index, line.text, line.startTimeMs, line.endTimeMs, line.closure);
  }

  endSession(sessionId: string, endedAt: number = Date.now()): void {
    this.connection
      .prepare<[number, string]>('UPDATE sessions SET ended_at = ? WHERE id = ?')
      .run(endedAt, sessionId);
  }

  getSession(id: string): StoredSession | null {
    const db = this.connection;
    const session = db.prepare<[string], SessionRow>('SELECT * FROM sessions WHERE id = ?').get(id);
    if (!session) return null;

    const lines = db
      .prepare<[string], LineRow>(
        'SELECT * FROM transcript_lines WHERE session_id = ? ORDER BY line_index',
      )
      .all(id);

    return {
      id: session.id,
      title: session.title,
      deviceIndex: session.device_index,
      engine: session.engine,
      language: session.language,
      createdAt: session.created_at,
      endedAt: session.ended_at,
      lines: lines.map((l) => ({
        index: l.line_index,
        text: l.text,
        startTimeMs: l.start_time_ms,
        endTimeMs: l.end_time_ms,
        closure: toClosure(l.closure),
      })),
    };
  }

  listSessions(): SessionSummary[] {
    const rows = this.connection
      .prepare<[], SummaryRow>(`
        SELECT s.id, s.title, s.created_at, s.ended_at,
               COALESCE(
                 s.ended_at - s.created_at,
                 (SELECT MAX(end_time_ms) FROM transcript_lines WHERE session_id = s.id),
                 0
               ) as duration_ms,
               (SELECT COUNT(*) FROM transcript_lines WHERE session_id = s.id) as line_count
        FROM sessions s
        ORDER BY s.created_at DESC
      `)
      .all();

    return rows.map((r) => ({
      id: r.id,
      title: r.title,
      createdAt: r.created_at,
      endedAt: r.ended_at,
      durationMs: r.duration_ms,
      lineCount: r.line_count,
    }));
  }

  deleteSession(id: string): void {
    this.connection.prepare<[string]>('DELETE FROM sessions WHERE id = ?').run(id);
  }

  // ── Search ────────────────────────────────────────────────────────

  /** Prefix match on every word; title hits first, then transcript hits, one per session */
  search(query: string): SearchResult[] {
    const ftsQuery = query
      .split(/\s+/)
      .filter(Boolean)
      .map((w) => `"${w.replace(/"/g, '""')}"*`)
      .join(' ');

    if (!ftsQuery) return [];

    const db = this.connection;
    const titleHits = db
      .prepare<[string], SearchRow>(`
        SELECT s.id as session_id, s.title, s.created_at,
               snippet(sessions_fts, 0, '[', ']', '...', 16) as excerpt
        FROM sessions_fts
        JOIN sessions s ON s.rowid = sessions_fts.rowid
        WHERE sessions_fts MATCH ?
        LIMIT 20
      `)
      .all(ftsQuery);

    const lineHits = db
      .prepare<[string], SearchRow>(`
        SELECT l.session_id, s.title, s.created_at,
               snippet(transcript_lines_fts, 0, '[', ']', '...', 16) as excerpt
        FROM transcript_lines_fts
        JOIN transcript_lines l ON l.rowid = transcript_lines_fts.rowid
        JOIN sessions s ON s.id = l.session_id
        WHERE transcript_lines_fts MATCH ?
        LIMIT 100
      `)
      .all(ftsQuery);

    const results: SearchResult[] = [];
    for (const hit of [...titleHits, ...lineHits]) {
      // Avoid duplicates
      if (results.some((r) => r.sessionId === hit.session_id)) continue;
      results.push({
        sessionId: hit.session_id,
        title: hit.title,
        excerpt: hit.excerpt ?? '',
        createdAt: hit.created_at,
      });
    }
    return results;
  }

  onModuleDestroy(): void {
    this.db?.close();
    this.db = null;
  }
}

function toClosure(value: string): ClosureKind {
  return value === 'forced' || value === 'flush' ? value : 'natural';
}
