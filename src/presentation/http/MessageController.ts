import { Request, Response } from 'express';
import { MessageService } from '../../application/services/MessageService.js';
import { SessionService } from '../../application/services/SessionService.js';
import { Message } from '../../core/entities/Message.js';
import { parseRequest } from './ValidationError.js';
import {
  CreateMessageBody,
  MessageParams,
  PaginationQuery,
  SessionParams,
  UpdateMessageStatusBody,
} from './schemas.js';
import { serializeMessage, serializeResume } from './serializers.js';

/**
 * HTTP handlers for /sessions/:sessionId/messages
 */
export class MessageController {
  constructor(
    private messageService: MessageService,
    private sessionService: SessionService
  ) {}

  create = (req: Request, res: Response): void => {
    const { sessionId } = parseRequest(SessionParams, req.params, 'params');
    const body = parseRequest(CreateMessageBody, req.body, 'body');
    const message = this.messageService.createMessage(sessionId, {
      sender: body.sender,
      content: body.content,
      context: body.context ?? undefined,
      timestamp: body.timestamp,
    });
    res.status(201).json(serializeMessage(message));
  };

  list = (req: Request, res: Response): void => {
    const { sessionId } = parseRequest(SessionParams, req.params, 'params');
    const query = parseRequest(PaginationQuery, req.query, 'query');
    const { messages, total } = this.messageService.getSessionMessages(
      sessionId,
      query.skip,
      query.limit
    );
    res.json({ messages: messages.map(serializeMessage), total });
  };

  get = (req: Request, res: Response): void => {
    const message = this.findInSession(req, res);
    if (!message) return;
    res.json(serializeMessage(message));
  };

  updateStatus = (req: Request, res: Response): void => {
    const body = parseRequest(UpdateMessageStatusBody, req.body, 'body');
    const message = this.findInSession(req, res);
    if (!message) return;

    const updated = this.messageService.updateMessageStatus(
      message.id,
      body.status,
      body.error_message ?? undefined
    );
    if (!updated) {
      res.status(404).json({ detail: `Message ${message.id} not found` });
      return;
    }
    res.json(serializeMessage(updated));
  };

  remove = (req: Request, res: Response): void => {
    const message = this.findInSession(req, res);
    if (!message) return;

    if (!this.messageService.deleteMessage(message.id)) {
      res.status(404).json({ detail: `Message ${message.id} not found` });
      return;
    }
    res.status(204).end();
  };

  /**
   * Resumes the session's latest message; the addressed message only has
   * to belong to the session.
   */
  resume = (req: Request, res: Response): void => {
    const message = this.findInSession(req, res);
    if (!message) return;

    const result = this.messageService.resumeFailedMessage(message.sessionId);
    res.json(serializeResume(result));
  };

  /**
   * Resolve :messageId within :sessionId, answering 404 when either is missing.
   */
  private findInSession(req: Request, res: Response): Message | null {
    const { sessionId, messageId } = parseRequest(MessageParams, req.params, 'params');

    if (!this.sessionService.sessionExists(sessionId)) {
      res.status(404).json({ detail: `Session ${sessionId} not found` });
      return null;
    }

    const message = this.messageService.getMessageById(messageId);
    if (!message || message.sessionId !== sessionId) {
      res.status(404).json({ detail: `Message ${messageId} not found in session ${sessionId}` });
      return null;
    }

    return message;
  }
}
