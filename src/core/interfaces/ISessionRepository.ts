import { NewSession, Session, SessionFilters, SessionUpdateFields } from '../entities/Session.js';

/**
 * Interface for session persistence. Lookups return `null` when the row is absent.
 */
export interface ISessionRepository {
  create(session: NewSession): Session;

  getById(sessionId: string): Session | null;

  listByUser(userId: string, skip?: number, limit?: number): Session[];

  countByUser(userId: string): number;

  list(filters?: SessionFilters): Session[];

  update(sessionId: string, fields: SessionUpdateFields): Session | null;

  delete(sessionId: string): boolean;

  exists(sessionId: string): boolean;
}
