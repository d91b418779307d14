import { IMessageRepository } from '../../core/interfaces/IMessageRepository.js';
import { ISessionRepository } from '../../core/interfaces/ISessionRepository.js';
import {
  Message,
  MessageContext,
  MessageStatus,
  RESUMABLE_STATUSES,
  ResumeResult,
  Sender,
} from '../../core/entities/Message.js';
import {
  MessageNotResumableError,
  NoMessagesFoundError,
  SessionNotFoundError,
} from '../../core/errors/DomainError.js';
import { getLogger } from '../../utils/logger.js';

const logger = getLogger('MessageService');

export interface CreateMessageInput {
  sender: Sender;
  content: string;
  context?: MessageContext;
  timestamp?: Date;
}

export interface MessagePage {
  messages: Message[];
  total: number;
}

/**
 * Service for managing messages within sessions
 */
export class MessageService {
  constructor(
    private messageRepo: IMessageRepository,
    private sessionRepo: ISessionRepository
  ) {}

  /**
   * Create a message. The session check runs before any write.
   */
  createMessage(sessionId: string, data: CreateMessageInput): Message {
    this.requireSession(sessionId, 'create_message');

    const message = this.messageRepo.create({
      sessionId,
      sender: data.sender,
      content: data.content,
      context: data.context,
      timestamp: data.timestamp,
    });

    logger.info('message_created', {
      messageId: message.id,
      sessionId: message.sessionId,
      sender: message.sender,
      contentLength: message.content.length,
    });

    return message;
  }

  /**
   * Get a chronological page of a session's messages plus the unpaged total
   */
  getSessionMessages(sessionId: string, skip: number = 0, limit: number = 100): MessagePage {
    this.requireSession(sessionId, 'get_session_messages');

    const messages = this.messageRepo.listBySession(sessionId, skip, limit);
    const total = this.messageRepo.countBySession(sessionId);

    logger.debug('session_messages_retrieved', {
      sessionId,
      count: messages.length,
      total,
      skip,
      limit,
    });

    return { messages, total };
  }

  /**
   * A message whose session no longer exists is reported as absent.
   */
  getMessageById(messageId: string): Message | null {
    const message = this.messageRepo.getById(messageId);

    if (!message) {
      logger.warn('message_not_found', { messageId });
      return null;
    }

    if (!this.sessionRepo.exists(message.sessionId)) {
      logger.warn('message_session_missing', { messageId, sessionId: message.sessionId });
      return null;
    }

    logger.debug('message_retrieved', { messageId });
    return message;
  }

  /**
   * Put the session's latest message back to pending so generation can be
   * retried. Only pending and failed messages can be resumed.
   */
  resumeFailedMessage(sessionId: string): ResumeResult {
    this.requireSession(sessionId, 'resume_failed_message');

    const latest = this.messageRepo.getLatestBySession(sessionId);
    if (!latest) {
      logger.warn('no_messages_found', { sessionId, action: 'resume_failed_message' });
      throw new NoMessagesFoundError(sessionId);
    }

    if (!RESUMABLE_STATUSES.includes(latest.status)) {
      logger.warn('message_not_resumable', {
        sessionId,
        messageId: latest.id,
        status: latest.status,
      });
      throw new MessageNotResumableError(latest.id, latest.status);
    }

    const updated = this.messageRepo.update(latest.id, {
      status: 'pending',
      errorMessage: null,
    });

    // Deleted between the read and the write
    if (!updated) {
      logger.warn('no_messages_found', { sessionId, messageId: latest.id, action: 'resume_failed_message' });
      throw new NoMessagesFoundError(sessionId);
    }

    logger.info('message_resumed', { sessionId, messageId: updated.id });

    return { messageId: updated.id, status: updated.status };
  }

  /**
   * Set a message's status as reported by the generation process. No
   * transition checks; omitting errorMessage clears it.
   */
  updateMessageStatus(
    messageId: string,
    status: MessageStatus,
    errorMessage?: string
  ): Message | null {
    const updated = this.messageRepo.update(messageId, {
      status,
      errorMessage: errorMessage ?? null,
    });

    if (updated) {
      logger.info('message_status_updated', { messageId, status, errorMessage });
    } else {
      logger.warn('message_not_found', { messageId, action: 'update_message_status' });
    }

    return updated;
  }

  deleteMessage(messageId: string): boolean {
    const deleted = this.messageRepo.delete(messageId);

    if (deleted) {
      logger.info('message_deleted', { messageId });
    } else {
      logger.warn('message_delete_failed', { messageId });
    }

    return deleted;
  }

  sessionHasMessages(sessionId: string): boolean {
    return this.messageRepo.existsInSession(sessionId);
  }

  private requireSession(sessionId: string, action: string): void {
    if (!this.sessionRepo.exists(sessionId)) {
      logger.warn('session_not_found', { sessionId, action });
      throw new SessionNotFoundError(sessionId);
    }
  }
}
