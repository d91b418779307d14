import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { IMessageRepository } from '../../../core/interfaces/IMessageRepository.js';
import {
  MESSAGE_STATUSES,
  Message,
  MessageFilters,
  MessageUpdateFields,
  NewMessage,
  SENDERS,
} from '../../../core/entities/Message.js';
import {
  Clock,
  ColumnValue,
  decodeRow,
  encodeTimestamp,
  isoTimestamp,
  jsonObjectColumn,
  nextUpdatedAt,
  systemClock,
} from '../rowCodec.js';

const MessageRowSchema = z
  .object({
    id: z.string(),
    session_id: z.string(),
    sender: z.enum(SENDERS),
    content: z.string(),
    context: jsonObjectColumn,
    status: z.enum(MESSAGE_STATUSES),
    partial_content: z.string().nullable(),
    error_message: z.string().nullable(),
    timestamp: isoTimestamp,
    created_at: isoTimestamp,
    updated_at: isoTimestamp,
  })
  .transform(
    (row): Message => ({
      id: row.id,
      sessionId: row.session_id,
      sender: row.sender,
      content: row.content,
      context: row.context,
      status: row.status,
      partialContent: row.partial_content ?? undefined,
      errorMessage: row.error_message ?? undefined,
      timestamp: row.timestamp,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    })
  );

/**
 * SQLite implementation of message repository
 */
export class MessageRepository implements IMessageRepository {
  constructor(
    private db: Database.Database,
    private clock: Clock = systemClock
  ) {}

  create(message: NewMessage): Message {
    const now = this.clock();
    const record: Message = {
      id: randomUUID(),
      sessionId: message.sessionId,
      sender: message.sender,
      content: message.content,
      context: message.context,
      status: message.status ?? 'pending',
      partialContent: message.partialContent,
      errorMessage: message.errorMessage,
      timestamp: message.timestamp ?? now,
      createdAt: now,
      updatedAt: now,
    };

    this.db
      .prepare(`
      INSERT INTO messages (
        id, session_id, sender, content, context, status,
        partial_content, error_message, timestamp, created_at, updated_at
      )
      VALUES (
        @id, @session_id, @sender, @content, @context, @status,
        @partial_content, @error_message, @timestamp, @created_at, @updated_at
      )
    `)
      .run({
        id: record.id,
        session_id: record.sessionId,
        sender: record.sender,
        content: record.content,
        context: record.context ? JSON.stringify(record.context) : null,
        status: record.status,
        partial_content: record.partialContent ?? null,
        error_message: record.errorMessage ?? null,
        timestamp: encodeTimestamp(record.timestamp),
        created_at: encodeTimestamp(record.createdAt),
        updated_at: encodeTimestamp(record.updatedAt),
      });

    return record;
  }

  getById(messageId: string): Message | null {
    const row = this.db.prepare('SELECT * FROM messages WHERE id = ?').get(messageId);
    return row ? this.toEntity(row) : null;
  }

  /**
   * Messages in chronological order, earliest first
   */
  listBySession(sessionId: string, skip: number = 0, limit: number = 100): Message[] {
    const rows = this.db
      .prepare(`
      SELECT * FROM messages
      WHERE session_id = ?
      ORDER BY timestamp ASC, rowid ASC
      LIMIT ? OFFSET ?
    `)
      .all(sessionId, limit, skip);

    return rows.map((row) => this.toEntity(row));
  }

  countBySession(sessionId: string): number {
    const count = this.db
      .prepare('SELECT COUNT(*) AS count FROM messages WHERE session_id = ?')
      .pluck()
      .get(sessionId);
    return typeof count === 'number' ? count : 0;
  }

  getLatestBySession(sessionId: string): Message | null {
    const row = this.db
      .prepare(`
      SELECT * FROM messages
      WHERE session_id = ?
      ORDER BY timestamp DESC, rowid DESC
      LIMIT 1
    `)
      .get(sessionId);

    return row ? this.toEntity(row) : null;
  }

  list(filters: MessageFilters = {}): Message[] {
    const clauses: string[] = [];
    const params: Record<string, ColumnValue> = {};

    if (filters.sessionId !== undefined) {
      clauses.push('session_id = @session_id');
      params.session_id = filters.sessionId;
    }
    if (filters.sender !== undefined) {
      clauses.push('sender = @sender');
      params.sender = filters.sender;
    }
    if (filters.status !== undefined) {
      clauses.push('status = @status');
      params.status = filters.status;
    }

    if (clauses.length === 0) {
      const rows = this.db.prepare('SELECT * FROM messages ORDER BY timestamp, rowid').all();
      return rows.map((row) => this.toEntity(row));
    }

    const rows = this.db
      .prepare(`SELECT * FROM messages WHERE ${clauses.join(' AND ')} ORDER BY timestamp, rowid`)
      .all(params);
    return rows.map((row) => this.toEntity(row));
  }

  /**
   * Sparse update. `undefined` leaves a column alone, `null` clears it.
   */
  update(messageId: string, fields: MessageUpdateFields): Message | null {
    const current = this.getById(messageId);
    if (!current) return null;

    const assignments: string[] = [];
    const params: Record<string, ColumnValue> = { id: messageId };
    const assign = (column: string, value: ColumnValue) => {
      assignments.push(`${column} = @${column}`);
      params[column] = value;
    };

    if (fields.content !== undefined) {
      assign('content', fields.content);
    }
    if (fields.context !== undefined) {
      assign('context', fields.context === null ? null : JSON.stringify(fields.context));
    }
    if (fields.status !== undefined) {
      assign('status', fields.status);
    }
    if (fields.partialContent !== undefined) {
      assign('partial_content', fields.partialContent);
    }
    if (fields.errorMessage !== undefined) {
      assign('error_message', fields.errorMessage);
    }

    if (assignments.length === 0) {
      return current;
    }

    assign('updated_at', encodeTimestamp(nextUpdatedAt(this.clock, current.updatedAt)));

    const result = this.db
      .prepare(`UPDATE messages SET ${assignments.join(', ')} WHERE id = @id`)
      .run(params);

    if (result.changes === 0) return null;

    return this.getById(messageId);
  }

  delete(messageId: string): boolean {
    const result = this.db.prepare('DELETE FROM messages WHERE id = ?').run(messageId);
    return result.changes > 0;
  }

  exists(messageId: string): boolean {
    const id = this.db.prepare('SELECT id FROM messages WHERE id = ?').pluck().get(messageId);
    return id !== undefined;
  }

  existsInSession(sessionId: string): boolean {
    const id = this.db
      .prepare('SELECT id FROM messages WHERE session_id = ? LIMIT 1')
      .pluck()
      .get(sessionId);
    return id !== undefined;
  }

  private toEntity(row: unknown): Message {
    return decodeRow(MessageRowSchema, 'messages', row);
  }
}
