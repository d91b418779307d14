import { Request, Response } from 'express';
import { SessionService } from '../../application/services/SessionService.js';
import { parseRequest } from './ValidationError.js';
import {
  CreateSessionBody,
  FavoriteQuery,
  ListSessionsQuery,
  SessionParams,
  UpdateSessionBody,
} from './schemas.js';
import { serializeSession } from './serializers.js';

/**
 * HTTP handlers for /sessions
 */
export class SessionController {
  constructor(private sessionService: SessionService) {}

  create = (req: Request, res: Response): void => {
    const body = parseRequest(CreateSessionBody, req.body, 'body');
    const session = this.sessionService.createSession({
      userId: body.user_id,
      name: body.name ?? undefined,
      isFavorite: body.is_favorite ?? undefined,
    });
    res.status(201).json(serializeSession(session));
  };

  list = (req: Request, res: Response): void => {
    const query = parseRequest(ListSessionsQuery, req.query, 'query');
    const { sessions, total } = this.sessionService.getUserSessions(
      query.user_id,
      query.skip,
      query.limit
    );
    res.json({ sessions: sessions.map(serializeSession), total });
  };

  get = (req: Request, res: Response): void => {
    const { sessionId } = parseRequest(SessionParams, req.params, 'params');
    const session = this.sessionService.getSessionById(sessionId);
    if (!session) {
      res.status(404).json({ detail: 'Session not found' });
      return;
    }
    res.json(serializeSession(session));
  };

  rename = (req: Request, res: Response): void => {
    const { sessionId } = parseRequest(SessionParams, req.params, 'params');
    const body = parseRequest(UpdateSessionBody, req.body, 'body');
    const session = this.sessionService.updateSessionName(sessionId, body.name);
    if (!session) {
      res.status(404).json({ detail: 'Session not found' });
      return;
    }
    res.json(serializeSession(session));
  };

  toggleFavorite = (req: Request, res: Response): void => {
    const { sessionId } = parseRequest(SessionParams, req.params, 'params');
    const query = parseRequest(FavoriteQuery, req.query, 'query');
    const session = this.sessionService.toggleFavorite(sessionId, query.is_favorite);
    if (!session) {
      res.status(404).json({ detail: 'Session not found' });
      return;
    }
    res.json(serializeSession(session));
  };

  remove = (req: Request, res: Response): void => {
    const { sessionId } = parseRequest(SessionParams, req.params, 'params');
    if (!this.sessionService.deleteSession(sessionId)) {
      res.status(404).json({ detail: 'Session not found' });
      return;
    }
    res.status(204).end();
  };
}
