import { describe, it, expect, vi, beforeAll, afterAll, afterEach } from 'vitest';
import { Server as HttpServer } from 'http';
import { closeServer, createMcpHttpServer } from '../../src/transport/http.js';
import { createSseHttpServer } from '../../src/transport/sse.js';
import { createServer } from '../../src/server.js';
import { createContext, createFakeProvider } from '../helpers/fake-provider.js';

const ACCEPT = 'application/json, text/event-stream';

const initRequest = {
  jsonrpc: '2.0',
  id: 1,
  method: 'initialize',
  params: {
    protocolVersion: '2024-11-05',
    capabilities: {},
    clientInfo: { name: 'test-client', version: '1.0.0' },
  },
};

function listenOnRandomPort(httpServer: HttpServer): Promise<string> {
  return new Promise((resolve) => {
    httpServer.listen(0, '127.0.0.1', () => {
      const addr = httpServer.address();
      resolve(addr && typeof addr === 'object' ? `http://${addr.address}:${addr.port}` : '');
    });
  });
}

async function openSession(baseUrl: string): Promise<string> {
  const response = await fetch(`${baseUrl}/mcp`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', Accept: ACCEPT },
    body: JSON.stringify(initRequest),
  });
  await response.text();
  return response.headers.get('mcp-session-id') ?? '';
}

/**
 * Pull the JSON-RPC message with the given id out of an SSE response body
 */
function readSseMessage(text: string, id: number): unknown {
  for (const line of text.split('\n')) {
    if (!line.startsWith('data: ')) {
      continue;
    }
    const message: unknown = JSON.parse(line.slice(6));
    if (typeof message === 'object' && message !== null && 'id' in message && message.id === id) {
      return message;
    }
  }
  return null;
}

describe('HTTP Transport /mcp endpoint', () => {
  const provider = createFakeProvider();
  let httpServer: HttpServer;
  let baseUrl: string;

  beforeAll(async () => {
    httpServer = createMcpHttpServer(() => createServer(createContext(provider)));

    await new Promise<void>((resolve) => {
      httpServer.listen(0, '127.0.0.1', () => {
        const addr = httpServer.address();
        if (addr && typeof addr === 'object') {
          baseUrl = `http://${addr.address}:${addr.port}`;
        }
        resolve();
      });
    });
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => {
      httpServer.close(() => resolve());
    });
  });

  async function initialize(): Promise<{ sessionId: string; body: string }> {
    const response = await fetch(`${baseUrl}/mcp`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: ACCEPT },
      body: JSON.stringify(initRequest),
    });
    expect(response.status).toBe(200);
    return {
      sessionId: response.headers.get('mcp-session-id') ?? '',
      body: await response.text(),
    };
  }

  it('should respond to health check endpoint', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok', transport: 'http' });
  });

  it('should return 404 for unknown endpoints', async () => {
    const response = await fetch(`${baseUrl}/unknown`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found' });
  });

  it('should return 405 for unsupported methods', async () => {
    const response = await fetch(`${baseUrl}/health`, { method: 'PUT' });

    expect(response.status).toBe(405);
    expect(await response.json()).toEqual({ error: 'Method not allowed' });
  });

  it('should start a session on initialize', async () => {
    const { sessionId, body } = await initialize();

    expect(sessionId).not.toBe('');
    expect(readSseMessage(body, 1)).toMatchObject({
      jsonrpc: '2.0',
      id: 1,
      result: {
        serverInfo: { name: 'gmaps-tools', version: '1.0.0' },
        capabilities: { tools: {} },
      },
    });
  });

  it('should return 400 for GET request without session ID', async () => {
    const response = await fetch(`${baseUrl}/mcp`, {
      method: 'GET',
      headers: { Accept: 'application/json' },
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Invalid or missing session ID' });
  });

  it('should reject a non-initialize request without a session', async () => {
    const response = await fetch(`${baseUrl}/mcp`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: ACCEPT },
      body: JSON.stringify({ jsonrpc: '2.0', id: 2, method: 'tools/list', params: {} }),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32000, message: 'Bad Request: No valid session ID provided' },
    });
  });

  it('should answer malformed JSON with a parse error', async () => {
    const response = await fetch(`${baseUrl}/mcp`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: ACCEPT },
      body: '{not json',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32700, message: 'Parse error: request body is not valid JSON' },
    });
  });

  it('should call a tool within a session', async () => {
    provider.geocode.mockResolvedValueOnce([
      { geometry: { location: { lat: 40.7128, lng: -74.006 } } },
    ]);
    const { sessionId } = await initialize();

    const response = await fetch(`${baseUrl}/mcp`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: ACCEPT,
        'mcp-session-id': sessionId,
        'mcp-protocol-version': '2024-11-05',
      },
      body: JSON.stringify({
        jsonrpc: '2.0',
        id: 3,
        method: 'tools/call',
        params: { name: 'get_geocode', arguments: { address: 'New York' } },
      }),
    });

    expect(response.status).toBe(200);
    expect(readSseMessage(await response.text(), 3)).toMatchObject({
      result: {
        content: [{ type: 'text', text: '{"lat":40.7128,"lng":-74.006}' }],
        isError: false,
      },
    });
    expect(provider.geocode).toHaveBeenCalledWith('New York');
  });
});

describe('SSE Transport', () => {
  let httpServer: HttpServer;
  let baseUrl: string;

  beforeAll(async () => {
    httpServer = createSseHttpServer(() => createServer(createContext(createFakeProvider())));

    await new Promise<void>((resolve) => {
      httpServer.listen(0, '127.0.0.1', () => {
        const addr = httpServer.address();
        if (addr && typeof addr === 'object') {
          baseUrl = `http://${addr.address}:${addr.port}`;
        }
        resolve();
      });
    });
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => {
      httpServer.close(() => resolve());
    });
  });

  it('should report the transport in the health check', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(await response.json()).toEqual({ status: 'ok', transport: 'sse' });
  });

  it('should reject messages for an unknown session', async () => {
    const response = await fetch(`${baseUrl}/messages?sessionId=missing`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'tools/list', params: {} }),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Invalid or missing session ID' });
  });
});

describe('Session lifetime and shutdown', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should close sessions that stay idle', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const httpServer = createMcpHttpServer(() => createServer(createContext(createFakeProvider())), {
      sessionIdleMs: 50,
    });
    const baseUrl = await listenOnRandomPort(httpServer);
    const sessionId = await openSession(baseUrl);

    await new Promise((resolve) => setTimeout(resolve, 250));

    const response = await fetch(`${baseUrl}/mcp`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: ACCEPT,
        'mcp-session-id': sessionId,
        'mcp-protocol-version': '2024-11-05',
      },
      body: JSON.stringify({ jsonrpc: '2.0', id: 2, method: 'tools/list', params: {} }),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32000, message: 'Bad Request: No valid session ID provided' },
    });
    expect(console.error).toHaveBeenCalledWith(`Closing idle session ${sessionId}`);

    await closeServer(httpServer);
  });

  it('should close while a client holds a streamable HTTP event stream', async () => {
    const httpServer = createMcpHttpServer(() => createServer(createContext(createFakeProvider())));
    const baseUrl = await listenOnRandomPort(httpServer);
    const sessionId = await openSession(baseUrl);

    const stream = await fetch(`${baseUrl}/mcp`, {
      method: 'GET',
      headers: {
        Accept: 'text/event-stream',
        'mcp-session-id': sessionId,
        'mcp-protocol-version': '2024-11-05',
      },
    });
    expect(stream.status).toBe(200);

    await expect(closeServer(httpServer)).resolves.toBeUndefined();
    expect(httpServer.listening).toBe(false);
  });

  it('should close while a client holds an SSE stream', async () => {
    const httpServer = createSseHttpServer(() => createServer(createContext(createFakeProvider())));
    const baseUrl = await listenOnRandomPort(httpServer);

    const stream = await fetch(`${baseUrl}/sse`);
    expect(stream.status).toBe(200);

    await expect(closeServer(httpServer)).resolves.toBeUndefined();
    expect(httpServer.listening).toBe(false);
  });
});
