import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { MessageStatus } from '../../core/entities/Message.js';

export const IN_MEMORY_DATABASE = ':memory:';

export interface DatabaseStatistics {
  totalSessions: number;
  totalMessages: number;
  databaseSize: number;
  messageStats: Record<MessageStatus, number>;
}

/**
 * Database connection manager
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath === IN_MEMORY_DATABASE ? dbPath : path.resolve(dbPath);

    if (this.dbPath !== IN_MEMORY_DATABASE) {
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    // Message rows are removed with their session by the store itself
    this.db.pragma('foreign_keys = ON');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        name TEXT NOT NULL DEFAULT 'New Chat',
        is_favorite INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_user_id ON sessions(user_id);
      CREATE INDEX IF NOT EXISTS idx_sessions_user_order ON sessions(user_id, is_favorite, updated_at);

      CREATE TABLE IF NOT EXISTS messages (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        sender TEXT NOT NULL,
        content TEXT NOT NULL,
        context TEXT,
        status TEXT NOT NULL DEFAULT 'pending',
        partial_content TEXT,
        error_message TEXT,
        timestamp TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_messages_session_id ON messages(session_id);
      CREATE INDEX IF NOT EXISTS idx_messages_session_timestamp ON messages(session_id, timestamp);
      CREATE INDEX IF NOT EXISTS idx_messages_status ON messages(status);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): DatabaseStatistics {
    const sessions = this.db.prepare('SELECT COUNT(*) AS count FROM sessions').pluck().get();
    const messages = this.db.prepare('SELECT COUNT(*) AS count FROM messages').pluck().get();

    let databaseSize = 0;
    if (this.dbPath !== IN_MEMORY_DATABASE && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    const counts = new Map<string, number>();
    const rows = this.db
      .prepare('SELECT status, COUNT(*) AS count FROM messages GROUP BY status')
      .all();
    for (const row of rows) {
      if (isStatusCount(row)) {
        counts.set(row.status, row.count);
      }
    }

    const countOf = (status: MessageStatus) => counts.get(status) ?? 0;

    return {
      totalSessions: typeof sessions === 'number' ? sessions : 0,
      totalMessages: typeof messages === 'number' ? messages : 0,
      databaseSize,
      messageStats: {
        pending: countOf('pending'),
        in_progress: countOf('in_progress'),
        complete: countOf('complete'),
        failed: countOf('failed'),
      },
    };
  }
}

function isStatusCount(row: unknown): row is { status: string; count: number } {
  return (
    typeof row === 'object' &&
    row !== null &&
    'status' in row &&
    typeof row.status === 'string' &&
    'count' in row &&
    typeof row.count === 'number'
  );
}
