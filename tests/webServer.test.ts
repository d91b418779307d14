import { Server } from 'http';
import { getConfig } from '../src/config.js';
import { DatabaseConnection, IN_MEMORY_DATABASE } from '../src/infrastructure/database/DatabaseConnection.js';
import { SessionRepository } from '../src/infrastructure/database/repositories/SessionRepository.js';
import { MessageRepository } from '../src/infrastructure/database/repositories/MessageRepository.js';
import { SessionService } from '../src/application/services/SessionService.js';
import { MessageService } from '../src/application/services/MessageService.js';
import { WebServer } from '../src/infrastructure/web/WebServer.js';

const API_KEY = 'test-secret-key';
const USER = '11111111-1111-4111-8111-111111111111';
const AUTH = { Authorization: `Bearer ${API_KEY}`, 'Content-Type': 'application/json' };

function idOf(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'id' in body && typeof body.id === 'string') {
    return body.id;
  }
  throw new Error(`No id in ${JSON.stringify(body)}`);
}

function closeServer(server: Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

describe('WebServer', () => {
  let connection: DatabaseConnection;
  let servers: Server[];

  beforeEach(() => {
    connection = new DatabaseConnection(IN_MEMORY_DATABASE);
    servers = [];
  });

  afterEach(async () => {
    await Promise.all(servers.map(closeServer));
    connection.close();
  });

  const build = (env: NodeJS.ProcessEnv = {}) => {
    const config = getConfig(['node', 'index.js'], { API_KEY, ...env });
    const sessionRepo = new SessionRepository(connection.getDatabase());
    const messageRepo = new MessageRepository(connection.getDatabase());
    return new WebServer(
      config,
      {
        sessions: new SessionService(sessionRepo),
        messages: new MessageService(messageRepo, sessionRepo),
      },
      connection
    );
  };

  /**
   * Listen on an ephemeral port and return the loopback base URL
   */
  const listen = (webServer: WebServer): Promise<{ baseUrl: string; port: number }> =>
    new Promise((resolve, reject) => {
      const server = webServer.getApp().listen(0);
      servers.push(server);
      server.once('error', reject);
      server.once('listening', () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server has no TCP address'));
          return;
        }
        resolve({ baseUrl: `http://127.0.0.1:${address.port}`, port: address.port });
      });
    });

  test('should serve /health without credentials', async () => {
    const { baseUrl } = await listen(build());

    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual(expect.objectContaining({ status: 'OK' }));
    expect(response.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
  });

  test('should require the API key on every prefixed route', async () => {
    const { baseUrl } = await listen(build());

    const response = await fetch(`${baseUrl}/api/v1/sessions?user_id=${USER}`);

    expect(response.status).toBe(401);
    expect(response.headers.get('www-authenticate')).toBe('Bearer');
    expect(await response.json()).toEqual({ detail: 'Not authenticated' });
  });

  test('should route session and message requests to their handlers', async () => {
    const { baseUrl } = await listen(build());
    const api = `${baseUrl}/api/v1`;

    const created = await fetch(`${api}/sessions`, {
      method: 'POST',
      headers: AUTH,
      body: JSON.stringify({ user_id: USER, name: 'Wired' }),
    });
    expect(created.status).toBe(201);
    const sessionId = idOf(await created.json());

    const message = await fetch(`${api}/sessions/${sessionId}/messages`, {
      method: 'POST',
      headers: AUTH,
      body: JSON.stringify({ sender: 'user', content: 'Hello' }),
    });
    expect(message.status).toBe(201);

    const listed = await fetch(`${api}/sessions/${sessionId}/messages`, { headers: AUTH });
    expect(listed.status).toBe(200);
    expect(await listed.json()).toEqual({
      messages: [expect.objectContaining({ content: 'Hello', session_id: sessionId })],
      total: 1,
    });

    const deleted = await fetch(`${api}/sessions/${sessionId}`, { method: 'DELETE', headers: AUTH });
    expect(deleted.status).toBe(204);

    const missing = await fetch(`${api}/sessions/${sessionId}`, { headers: AUTH });
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ detail: 'Session not found' });
  });

  test('should answer 400 for a malformed JSON body', async () => {
    const { baseUrl } = await listen(build());

    const response = await fetch(`${baseUrl}/api/v1/sessions`, {
      method: 'POST',
      headers: AUTH,
      body: '{"user_id":',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ detail: 'Malformed JSON body' });
  });

  test('should answer 404 for an unknown route', async () => {
    const { baseUrl } = await listen(build());

    const response = await fetch(`${baseUrl}/api/v1/nowhere`, { headers: AUTH });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ detail: 'Route GET /api/v1/nowhere not found' });
  });

  test('should answer 429 once an operation exhausts its budget', async () => {
    const { baseUrl } = await listen(build({ RATE_LIMIT_RESUME_MESSAGE: '2/minute' }));
    const api = `${baseUrl}/api/v1`;

    const created = await fetch(`${api}/sessions`, {
      method: 'POST',
      headers: AUTH,
      body: JSON.stringify({ user_id: USER }),
    });
    const sessionId = idOf(await created.json());
    const message = await fetch(`${api}/sessions/${sessionId}/messages`, {
      method: 'POST',
      headers: AUTH,
      body: JSON.stringify({ sender: 'ai', content: 'Draft' }),
    });
    const messageId = idOf(await message.json());

    const resume = () =>
      fetch(`${api}/sessions/${sessionId}/messages/${messageId}/resume`, {
        method: 'POST',
        headers: AUTH,
      });

    expect((await resume()).status).toBe(200);
    expect((await resume()).status).toBe(200);

    const limited = await resume();
    expect(limited.status).toBe(429);
    expect(await limited.json()).toEqual({ detail: 'Rate limit exceeded: 2/minute' });
  });

  test('should not apply limits when rate limiting is disabled', async () => {
    const { baseUrl } = await listen(
      build({ RATE_LIMITER_ENABLED: 'false', RATE_LIMIT_LIST_SESSIONS: '1/minute' })
    );

    const statuses: number[] = [];
    for (let i = 0; i < 3; i++) {
      const response = await fetch(`${baseUrl}/api/v1/sessions?user_id=${USER}`, { headers: AUTH });
      statuses.push(response.status);
    }

    expect(statuses).toEqual([200, 200, 200]);
  });

  describe('start and stop', () => {
    test('should stop cleanly when never started', async () => {
      const server = build();

      expect(server.isRunning()).toBe(false);
      await expect(server.stop()).resolves.toBeUndefined();
    });

    test('should reject and stay stopped when the port is taken', async () => {
      const { port } = await listen(build());
      const server = build({ PORT: String(port) });

      await expect(server.start()).rejects.toThrow(/EADDRINUSE/);
      expect(server.isRunning()).toBe(false);
      await expect(server.stop()).resolves.toBeUndefined();
    });
  });

  test('should keep the in-memory database path as given', () => {
    expect(connection.getDatabasePath()).toBe(':memory:');
    expect(connection.isOpen()).toBe(true);
  });
});
