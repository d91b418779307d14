import { Message, MessageFilters, MessageUpdateFields, NewMessage } from '../entities/Message.js';

/**
 * Interface for message persistence
 */
export interface IMessageRepository {
  create(message: NewMessage): Message;

  getById(messageId: string): Message | null;

  listBySession(sessionId: string, skip?: number, limit?: number): Message[];

  countBySession(sessionId: string): number;

  getLatestBySession(sessionId: string): Message | null;

  list(filters?: MessageFilters): Message[];

  update(messageId: string, fields: MessageUpdateFields): Message | null;

  delete(messageId: string): boolean;

  exists(messageId: string): boolean;

  existsInSession(sessionId: string): boolean;
}
