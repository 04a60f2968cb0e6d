import { randomUUID } from 'node:crypto';
import {
  createServer as createHttpServer,
  IncomingMessage,
  ServerResponse,
  Server as HttpServer,
} from 'node:http';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { SERVER_NAME } from '../server.js';

export type ServerFactory = () => Server;

export interface HttpTransportOptions {
  host: string;
  port: number;
  /** Close streamable HTTP sessions with no requests for this long. */
  sessionIdleMs?: number;
}

export const DEFAULT_SESSION_IDLE_MS = 30 * 60 * 1000;

interface Session {
  transport: StreamableHTTPServerTransport;
  lastSeen: number;
}

/**
 * Read the request body as a string
 */
export function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}

/**
 * Send a JSON response
 */
export function sendJson(res: ServerResponse, statusCode: number, data: unknown): void {
  const body = JSON.stringify(data);
  res.writeHead(statusCode, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(body),
  });
  res.end(body);
}

export function sendJsonRpcError(
  res: ServerResponse,
  statusCode: number,
  code: number,
  message: string
): void {
  sendJson(res, statusCode, { jsonrpc: '2.0', id: null, error: { code, message } });
}

function getSessionId(req: IncomingMessage): string | undefined {
  const header = req.headers['mcp-session-id'];
  return Array.isArray(header) ? header[0] : header;
}

/**
 * Route a request by path and method. Errors from the handlers are answered
 * with a 500 unless headers already went out.
 */
export function handleHttpRequest(
  req: IncomingMessage,
  res: ServerResponse,
  routes: Record<string, Partial<Record<string, () => Promise<void> | void>>>
): void {
  const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
  const method = req.method?.toUpperCase() ?? 'GET';

  const route = routes[url.pathname];
  if (!route) {
    sendJson(res, 404, { error: 'Not found' });
    return;
  }
  const handler = route[method];
  if (!handler) {
    sendJson(res, 405, { error: 'Method not allowed' });
    return;
  }

  Promise.resolve()
    .then(handler)
    .catch((error: unknown) => {
      console.error('Server error:', error);
      if (!res.headersSent) {
        const message = error instanceof Error ? error.message : 'Internal server error';
        sendJson(res, 500, { error: message });
      }
    });
}

export function closeTransport(transport: { close(): Promise<void> }): void {
  transport.close().catch((error: unknown) => console.error('Failed to close session:', error));
}

/**
 * Create an HTTP server speaking the MCP streamable HTTP protocol on /mcp.
 * Each session gets its own MCP server from the factory and is closed after
 * `sessionIdleMs` without requests. Does not listen.
 */
export function createMcpHttpServer(
  createServer: ServerFactory,
  options: Pick<HttpTransportOptions, 'sessionIdleMs'> = {}
): HttpServer {
  const sessions = new Map<string, Session>();
  const idleMs = options.sessionIdleMs ?? DEFAULT_SESSION_IDLE_MS;

  function findSession(req: IncomingMessage): StreamableHTTPServerTransport | undefined {
    const sessionId = getSessionId(req);
    const session = sessionId ? sessions.get(sessionId) : undefined;
    if (session) {
      session.lastSeen = Date.now();
    }
    return session?.transport;
  }

  const sweep = setInterval(() => {
    const cutoff = Date.now() - idleMs;
    for (const [id, session] of sessions) {
      if (session.lastSeen < cutoff) {
        sessions.delete(id);
        console.error(`Closing idle session ${id}`);
        closeTransport(session.transport);
      }
    }
  }, Math.min(idleMs, 60000));
  sweep.unref();

  async function handlePost(req: IncomingMessage, res: ServerResponse): Promise<void> {
    let body: unknown;
    try {
      body = JSON.parse(await readBody(req));
    } catch {
      sendJsonRpcError(res, 400, -32700, 'Parse error: request body is not valid JSON');
      return;
    }

    const existing = findSession(req);
    if (existing) {
      await existing.handleRequest(req, res, body);
      return;
    }

    if (getSessionId(req) || !isInitializeRequest(body)) {
      sendJsonRpcError(res, 400, -32000, 'Bad Request: No valid session ID provided');
      return;
    }

    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (id) => {
        sessions.set(id, { transport, lastSeen: Date.now() });
      },
    });
    transport.onclose = () => {
      if (transport.sessionId) {
        sessions.delete(transport.sessionId);
      }
    };

    await createServer().connect(transport);
    await transport.handleRequest(req, res, body);
  }

  async function handleSessionRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const transport = findSession(req);
    if (!transport) {
      sendJson(res, 400, { error: 'Invalid or missing session ID' });
      return;
    }
    await transport.handleRequest(req, res);
  }

  const httpServer = createHttpServer((req, res) => {
    handleHttpRequest(req, res, {
      '/mcp': {
        POST: () => handlePost(req, res),
        GET: () => handleSessionRequest(req, res),
        DELETE: () => handleSessionRequest(req, res),
      },
      '/health': {
        GET: () => sendJson(res, 200, { status: 'ok', transport: 'http' }),
      },
    });
  });

  httpServer.on('close', () => {
    clearInterval(sweep);
    for (const session of sessions.values()) {
      closeTransport(session.transport);
    }
    sessions.clear();
  });

  return httpServer;
}

/**
 * Stop accepting connections and drop the open ones, event streams included,
 * so the close callback does not wait on connected clients.
 */
export function closeServer(httpServer: HttpServer): Promise<void> {
  return new Promise((resolve, reject) => {
    httpServer.close((error) => (error ? reject(error) : resolve()));
    httpServer.closeAllConnections();
  });
}

/**
 * Start listening and install graceful shutdown on SIGINT/SIGTERM
 */
export function listen(
  httpServer: HttpServer,
  options: HttpTransportOptions,
  endpoints: string[]
): Promise<HttpServer> {
  return new Promise((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off('error', reject);
      console.error(`${SERVER_NAME} MCP server listening on http://${options.host}:${options.port}`);
      for (const endpoint of endpoints) {
        console.error(`  ${endpoint}: http://${options.host}:${options.port}${endpoint}`);
      }

      const shutdown = () => {
        console.error('Shutting down...');
        closeServer(httpServer).then(
          () => process.exit(0),
          (error: unknown) => {
            console.error('Shutdown failed:', error);
            process.exit(1);
          }
        );
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);

      resolve(httpServer);
    });
  });
}

/**
 * Start MCP server with the streamable HTTP transport
 */
export function startHttpTransport(
  createServer: ServerFactory,
  options: HttpTransportOptions
): Promise<HttpServer> {
  return listen(createMcpHttpServer(createServer, options), options, ['/mcp', '/health']);
}
