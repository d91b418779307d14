import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { ISessionRepository } from '../../../core/interfaces/ISessionRepository.js';
import {
  DEFAULT_SESSION_NAME,
  NewSession,
  Session,
  SessionFilters,
  SessionUpdateFields,
} from '../../../core/entities/Session.js';
import {
  Clock,
  ColumnValue,
  decodeRow,
  encodeTimestamp,
  isoTimestamp,
  nextUpdatedAt,
  sqliteBoolean,
  systemClock,
} from '../rowCodec.js';

const SessionRowSchema = z
  .object({
    id: z.string(),
    user_id: z.string(),
    name: z.string(),
    is_favorite: sqliteBoolean,
    created_at: isoTimestamp,
    updated_at: isoTimestamp,
  })
  .transform(
    (row): Session => ({
      id: row.id,
      userId: row.user_id,
      name: row.name,
      isFavorite: row.is_favorite,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    })
  );

/**
 * SQLite implementation of session repository
 */
export class SessionRepository implements ISessionRepository {
  constructor(
    private db: Database.Database,
    private clock: Clock = systemClock
  ) {}

  create(session: NewSession): Session {
    const now = this.clock();
    const record: Session = {
      id: randomUUID(),
      userId: session.userId,
      name: session.name ?? DEFAULT_SESSION_NAME,
      isFavorite: session.isFavorite ?? false,
      createdAt: now,
      updatedAt: now,
    };

    this.db
      .prepare(`
      INSERT INTO sessions (id, user_id, name, is_favorite, created_at, updated_at)
      VALUES (@id, @user_id, @name, @is_favorite, @created_at, @updated_at)
    `)
      .run({
        id: record.id,
        user_id: record.userId,
        name: record.name,
        is_favorite: record.isFavorite ? 1 : 0,
        created_at: encodeTimestamp(record.createdAt),
        updated_at: encodeTimestamp(record.updatedAt),
      });

    return record;
  }

  getById(sessionId: string): Session | null {
    const row = this.db.prepare('SELECT * FROM sessions WHERE id = ?').get(sessionId);
    return row ? this.toEntity(row) : null;
  }

  /**
   * Favorites always come first, then the most recently updated.
   */
  listByUser(userId: string, skip: number = 0, limit: number = 100): Session[] {
    const rows = this.db
      .prepare(`
      SELECT * FROM sessions
      WHERE user_id = ?
      ORDER BY is_favorite DESC, updated_at DESC, rowid DESC
      LIMIT ? OFFSET ?
    `)
      .all(userId, limit, skip);

    return rows.map((row) => this.toEntity(row));
  }

  countByUser(userId: string): number {
    const count = this.db
      .prepare('SELECT COUNT(*) AS count FROM sessions WHERE user_id = ?')
      .pluck()
      .get(userId);
    return typeof count === 'number' ? count : 0;
  }

  list(filters: SessionFilters = {}): Session[] {
    const clauses: string[] = [];
    const params: Record<string, ColumnValue> = {};

    if (filters.userId !== undefined) {
      clauses.push('user_id = @user_id');
      params.user_id = filters.userId;
    }
    if (filters.isFavorite !== undefined) {
      clauses.push('is_favorite = @is_favorite');
      params.is_favorite = filters.isFavorite ? 1 : 0;
    }

    if (clauses.length === 0) {
      const rows = this.db.prepare('SELECT * FROM sessions ORDER BY rowid').all();
      return rows.map((row) => this.toEntity(row));
    }

    const rows = this.db
      .prepare(`SELECT * FROM sessions WHERE ${clauses.join(' AND ')} ORDER BY rowid`)
      .all(params);
    return rows.map((row) => this.toEntity(row));
  }

  /**
   * Apply the settable fields present in `fields`. Anything else is ignored.
   */
  update(sessionId: string, fields: SessionUpdateFields): Session | null {
    const current = this.getById(sessionId);
    if (!current) return null;

    const assignments: string[] = [];
    const params: Record<string, ColumnValue> = { id: sessionId };
    const assign = (column: string, value: ColumnValue) => {
      assignments.push(`${column} = @${column}`);
      params[column] = value;
    };

    if (typeof fields.name === 'string') {
      assign('name', fields.name);
    }
    if (typeof fields.isFavorite === 'boolean') {
      assign('is_favorite', fields.isFavorite ? 1 : 0);
    }

    if (assignments.length === 0) {
      return current;
    }

    assign('updated_at', encodeTimestamp(nextUpdatedAt(this.clock, current.updatedAt)));

    const result = this.db
      .prepare(`UPDATE sessions SET ${assignments.join(', ')} WHERE id = @id`)
      .run(params);

    // Deleted between the read and the write
    if (result.changes === 0) return null;

    return this.getById(sessionId);
  }

  delete(sessionId: string): boolean {
    const result = this.db.prepare('DELETE FROM sessions WHERE id = ?').run(sessionId);
    return result.changes > 0;
  }

  exists(sessionId: string): boolean {
    const id = this.db.prepare('SELECT id FROM sessions WHERE id = ?').pluck().get(sessionId);
    return id !== undefined;
  }

  private toEntity(row: unknown): Session {
    return decodeRow(SessionRowSchema, 'sessions', row);
  }
}
