import { Router } from 'express';
import { SessionController } from './SessionController.js';
import { MessageController } from './MessageController.js';
import { RateLimiters } from '../../infrastructure/web/middleware/rateLimiter.js';

export interface Controllers {
  sessions: SessionController;
  messages: MessageController;
}

/**
 * Mount the session and message endpoints on `router`
 */
export function registerSessionRoutes(
  router: Router,
  { sessions, messages }: Controllers,
  limiters: RateLimiters
): Router {
  router.post('/sessions', limiters.createSession, sessions.create);
  router.get('/sessions', limiters.listSessions, sessions.list);
  router.get('/sessions/:sessionId', limiters.listSessions, sessions.get);
  router.put('/sessions/:sessionId', limiters.updateSession, sessions.rename);
  router.patch('/sessions/:sessionId/favorite', limiters.toggleFavorite, sessions.toggleFavorite);
  router.delete('/sessions/:sessionId', limiters.deleteSession, sessions.remove);

  router.post('/sessions/:sessionId/messages', limiters.createMessage, messages.create);
  router.get('/sessions/:sessionId/messages', limiters.getMessages, messages.list);
  router.get('/sessions/:sessionId/messages/:messageId', limiters.getMessages, messages.get);
  router.patch(
    '/sessions/:sessionId/messages/:messageId/status',
    limiters.updateMessage,
    messages.updateStatus
  );
  router.delete('/sessions/:sessionId/messages/:messageId', limiters.deleteMessage, messages.remove);
  router.post(
    '/sessions/:sessionId/messages/:messageId/resume',
    limiters.resumeMessage,
    messages.resume
  );

  return router;
}
