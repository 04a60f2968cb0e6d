import { createServer as createHttpServer, IncomingMessage, ServerResponse, Server as HttpServer } from 'node:http';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import {
  closeTransport,
  handleHttpRequest,
  listen,
  sendJson,
  type HttpTransportOptions,
  type ServerFactory,
} from './http.js';

const MESSAGES_PATH = '/messages';

/**
 * Create an HTTP server speaking the legacy HTTP+SSE protocol: GET /sse opens
 * the event stream, POST /messages?sessionId=... delivers client messages.
 */
export function createSseHttpServer(createServer: ServerFactory): HttpServer {
  const sessions = new Map<string, SSEServerTransport>();

  async function handleStream(res: ServerResponse): Promise<void> {
    const transport = new SSEServerTransport(MESSAGES_PATH, res);
    sessions.set(transport.sessionId, transport);
    res.on('close', () => {
      sessions.delete(transport.sessionId);
    });
    await createServer().connect(transport);
  }

  async function handleMessage(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const sessionId = url.searchParams.get('sessionId');
    const transport = sessionId ? sessions.get(sessionId) : undefined;
    if (!transport) {
      sendJson(res, 400, { error: 'Invalid or missing session ID' });
      return;
    }
    await transport.handlePostMessage(req, res);
  }

  const httpServer = createHttpServer((req, res) => {
    handleHttpRequest(req, res, {
      '/sse': {
        GET: () => handleStream(res),
      },
      [MESSAGES_PATH]: {
        POST: () => handleMessage(req, res),
      },
      '/health': {
        GET: () => sendJson(res, 200, { status: 'ok', transport: 'sse' }),
      },
    });
  });

  httpServer.on('close', () => {
    for (const transport of sessions.values()) {
      closeTransport(transport);
    }
    sessions.clear();
  });

  return httpServer;
}

/**
 * Start MCP server with the HTTP+SSE transport
 */
export function startSseTransport(
  createServer: ServerFactory,
  options: HttpTransportOptions
): Promise<HttpServer> {
  return listen(createSseHttpServer(createServer), options, ['/sse', MESSAGES_PATH, '/health']);
}
