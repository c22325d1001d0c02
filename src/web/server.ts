/**
 * Rainflow Engine - Web Server
 * ============================
 * Express REST API with WebSocket for real-time session updates
 */

import express from 'express';
import { createServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import { z } from 'zod';
import { SessionManager, createSessionManager } from '../session/manager';
import { initConfig, getConfig } from '../core/config';
import { CreateSessionPayloadZ, FeedPayloadZ, FinalizePayloadZ, formatIssues } from '../core/schemas';
import { SessionNotFoundError, isRainflowError } from '../core/errors';
import { getLogger, initLogger } from '../utils/logger';

// ============================================================================
// REQUEST HANDLERS
// ============================================================================

export interface ApiResponse {
  status: number;
  body: unknown;
}

/**
 * Map a thrown error onto an HTTP response
 */
export function errorResponse(error: unknown): ApiResponse {
  if (isRainflowError(error)) {
    return { status: error.httpStatus, body: error.toJSON() };
  }
  if (error instanceof SessionNotFoundError) {
    return { status: 404, body: { error: error.name, message: error.message } };
  }
  getLogger().error('Unhandled request error', error);
  return { status: 500, body: { error: 'InternalError', message: 'Internal server error' } };
}

function invalidPayload(error: z.ZodError): ApiResponse {
  return { status: 400, body: { error: 'ValidationError', issues: formatIssues(error) } };
}

function handle(action: () => ApiResponse): ApiResponse {
  try {
    return action();
  } catch (error) {
    return errorResponse(error);
  }
}

export function createApiHandlers(manager: SessionManager) {
  return {
    createSession(body: unknown): ApiResponse {
      const parsed = CreateSessionPayloadZ.safeParse(body ?? {});
      if (!parsed.success) return invalidPayload(parsed.error);
      return handle(() => ({ status: 201, body: manager.createSession(parsed.data) }));
    },

    listSessions(): ApiResponse {
      return { status: 200, body: manager.listSessions() };
    },

    getSession(id: string): ApiResponse {
      return handle(() => ({ status: 200, body: manager.getDetails(id) }));
    },

    feed(id: string, body: unknown): ApiResponse {
      const parsed = FeedPayloadZ.safeParse(body);
      if (!parsed.success) return invalidPayload(parsed.error);
      return handle(() => ({ status: 200, body: manager.feed(id, parsed.data.values, parsed.data.scale) }));
    },

    finalize(id: string, body: unknown): ApiResponse {
      const parsed = FinalizePayloadZ.safeParse(body ?? {});
      if (!parsed.success) return invalidPayload(parsed.error);
      return handle(() => ({ status: 200, body: manager.finalize(id, parsed.data.residualMethod) }));
    },

    deleteSession(id: string): ApiResponse {
      return handle(() => {
        manager.deleteSession(id);
        return { status: 204, body: null };
      });
    },
  };
}

export type ApiHandlers = ReturnType<typeof createApiHandlers>;

// ============================================================================
// WEBSOCKET MESSAGES
// ============================================================================

const WsMessageZ = z.discriminatedUnion('action', [
  z.object({ action: z.literal('create'), payload: CreateSessionPayloadZ.optional() }),
  z.object({ action: z.literal('feed'), sessionId: z.string(), payload: FeedPayloadZ }),
  z.object({ action: z.literal('finalize'), sessionId: z.string(), payload: FinalizePayloadZ.optional() }),
  z.object({ action: z.literal('get_state'), sessionId: z.string().optional() }),
]);

type WsMessage = z.infer<typeof WsMessageZ>;

function dispatch(api: ApiHandlers, message: WsMessage): ApiResponse {
  switch (message.action) {
    case 'create':
      return api.createSession(message.payload);
    case 'feed':
      return api.feed(message.sessionId, message.payload);
    case 'finalize':
      return api.finalize(message.sessionId, message.payload);
    case 'get_state':
      return message.sessionId ? api.getSession(message.sessionId) : api.listSessions();
  }
}

/**
 * Answer one client message. Session changes reach all clients through the
 * manager events, the reply only goes to the sender.
 */
export function handleWebSocketMessage(manager: SessionManager, raw: string): object {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { type: 'error', message: 'Invalid JSON' };
  }

  const parsed = WsMessageZ.safeParse(data);
  if (!parsed.success) {
    return { type: 'error', message: 'Invalid message', issues: formatIssues(parsed.error) };
  }

  const message = parsed.data;
  const response = dispatch(createApiHandlers(manager), message);

  if (response.status >= 400) {
    return { type: 'error', action: message.action, status: response.status, data: response.body };
  }
  return { type: 'result', action: message.action, data: response.body };
}

// ============================================================================
// SERVER SETUP
// ============================================================================

export function startWebServer(port?: number, configPath?: string) {
  if (configPath) {
    initConfig(configPath);
  }

  const config = getConfig();
  const logConfig = config.getLoggingConfig();
  const logger = initLogger(logConfig).child('web');
  const listenPort = port ?? config.getServerConfig().port;

  const manager = createSessionManager({ config });
  const api = createApiHandlers(manager);

  const app = express();
  const server = createServer(app);
  const wss = new WebSocketServer({ server });

  app.use(express.json({ limit: '10mb' }));

  const clients: Set<WebSocket> = new Set();

  function broadcast(data: object) {
    const message = JSON.stringify(data);
    clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
      }
    });
  }

  manager.onEvent((event) => {
    broadcast({ type: `session_${event.type}`, sessionId: event.sessionId, data: event.summary });
  });

  // ============================================================================
  // WebSocket Handlers
  // ============================================================================

  wss.on('connection', (ws) => {
    logger.info('Client connected');
    clients.add(ws);

    ws.send(JSON.stringify({ type: 'sessions_list', data: manager.listSessions() }));

    ws.on('message', (message) => {
      ws.send(JSON.stringify(handleWebSocketMessage(manager, message.toString())));
    });

    ws.on('close', () => {
      logger.info('Client disconnected');
      clients.delete(ws);
    });

    ws.on('error', (error) => {
      logger.error('WebSocket error', error);
    });
  });

  // ============================================================================
  // REST API
  // ============================================================================

  function send(res: express.Response, response: ApiResponse) {
    if (response.body === null) {
      res.status(response.status).end();
    } else {
      res.status(response.status).json(response.body);
    }
  }

  app.post('/api/sessions', (req, res) => send(res, api.createSession(req.body)));
  app.get('/api/sessions', (_req, res) => send(res, api.listSessions()));
  app.get('/api/sessions/:id', (req, res) => send(res, api.getSession(req.params.id)));
  app.post('/api/sessions/:id/feed', (req, res) => send(res, api.feed(req.params.id, req.body)));
  app.post('/api/sessions/:id/finalize', (req, res) => send(res, api.finalize(req.params.id, req.body)));
  app.delete('/api/sessions/:id', (req, res) => send(res, api.deleteSession(req.params.id)));

  // ============================================================================
  // Start Server
  // ============================================================================

  server.listen(listenPort, () => {
    logger.info(`Rainflow server running at http://localhost:${listenPort}`);
  });

  return { app, server, wss, manager };
}

if (require.main === module) {
  const port = process.argv[2] ? parseInt(process.argv[2], 10) : undefined;
  startWebServer(port, process.argv[3]);
}
