import { ISessionRepository } from '../../core/interfaces/ISessionRepository.js';
import { DEFAULT_SESSION_NAME, Session } from '../../core/entities/Session.js';
import { InvalidSessionNameError } from '../../core/errors/DomainError.js';
import { getLogger } from '../../utils/logger.js';

const logger = getLogger('SessionService');

export interface CreateSessionInput {
  userId: string;
  name?: string;
  isFavorite?: boolean;
}

export interface SessionPage {
  sessions: Session[];
  total: number;
}

/**
 * Service for managing chat sessions
 */
export class SessionService {
  constructor(private sessionRepo: ISessionRepository) {}

  /**
   * Create a session. Names are not unique.
   */
  createSession(data: CreateSessionInput): Session {
    const session = this.sessionRepo.create({
      userId: data.userId,
      name: data.name ?? DEFAULT_SESSION_NAME,
      isFavorite: data.isFavorite ?? false,
    });

    logger.info('session_created', {
      sessionId: session.id,
      userId: session.userId,
      sessionName: session.name,
    });

    return session;
  }

  /**
   * Get a page of a user's sessions plus the unpaged total.
   * The two reads are independent; total may drift under concurrent writes.
   */
  getUserSessions(userId: string, skip: number = 0, limit: number = 100): SessionPage {
    const sessions = this.sessionRepo.listByUser(userId, skip, limit);
    const total = this.sessionRepo.countByUser(userId);

    logger.debug('user_sessions_retrieved', {
      userId,
      count: sessions.length,
      total,
      skip,
      limit,
    });

    return { sessions, total };
  }

  getSessionById(sessionId: string): Session | null {
    const session = this.sessionRepo.getById(sessionId);

    if (session) {
      logger.debug('session_retrieved', { sessionId });
    } else {
      logger.warn('session_not_found', { sessionId });
    }

    return session;
  }

  /**
   * Rename a session. The name is stored trimmed; a blank name is rejected
   * without touching the store.
   */
  updateSessionName(sessionId: string, name: string): Session | null {
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      logger.warn('invalid_session_name', { sessionId, name });
      throw new InvalidSessionNameError();
    }

    const updated = this.sessionRepo.update(sessionId, { name: trimmed });

    if (updated) {
      logger.info('session_name_updated', { sessionId, newName: trimmed });
    } else {
      logger.warn('session_not_found', { sessionId, action: 'update_session_name' });
    }

    return updated;
  }

  toggleFavorite(sessionId: string, isFavorite: boolean): Session | null {
    const updated = this.sessionRepo.update(sessionId, { isFavorite });

    if (updated) {
      logger.info('session_favorite_toggled', { sessionId, isFavorite });
    } else {
      logger.warn('session_not_found', { sessionId, action: 'toggle_favorite' });
    }

    return updated;
  }

  /**
   * Delete a session; the store removes its messages with it.
   */
  deleteSession(sessionId: string): boolean {
    const deleted = this.sessionRepo.delete(sessionId);

    if (deleted) {
      logger.info('session_deleted', { sessionId });
    } else {
      logger.warn('session_delete_failed', { sessionId });
    }

    return deleted;
  }

  sessionExists(sessionId: string): boolean {
    return this.sessionRepo.exists(sessionId);
  }
}
