#!/usr/bin/env node

import { createServer, SERVER_NAME, SERVER_VERSION } from './server.js';
import { startStdioTransport, startHttpTransport, startSseTransport } from './transport/index.js';
import { getConfig, setConfig, parseTransport, type TransportMode } from './config.js';
import { GoogleMapsProvider } from './provider/google.js';
import type { ToolContext } from './types.js';

interface CliArgs {
  transport?: TransportMode;
  port?: number;
  host?: string;
}

/**
 * Parse command line arguments
 */
function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--transport' || arg === '-t') {
      const value = args[++i] ?? '';
      const transport = parseTransport(value);
      if (transport) {
        result.transport = transport;
      } else {
        console.error(`Invalid transport: ${value}. Use 'stdio', 'http' or 'sse'.`);
        process.exit(1);
      }
    } else if (arg === '--port' || arg === '-p') {
      const value = parseInt(args[++i] ?? '', 10);
      if (!isNaN(value)) {
        result.port = value;
      } else {
        console.error(`Invalid port: ${args[i]}. Must be a number.`);
        process.exit(1);
      }
    } else if (arg === '--host' || arg === '-H') {
      const value = args[++i];
      if (value) {
        result.host = value;
      } else {
        console.error('Missing value for --host.');
        process.exit(1);
      }
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    } else if (arg === '--version' || arg === '-v') {
      console.log(`${SERVER_NAME} v${SERVER_VERSION}`);
      process.exit(0);
    }
  }

  return result;
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
${SERVER_NAME} - Google Maps MCP Server

USAGE:
  ${SERVER_NAME} [OPTIONS]

OPTIONS:
  -t, --transport <mode>  Transport mode: 'stdio' (default), 'http' or 'sse'
  -p, --port <number>     HTTP server port (default: 8080)
  -H, --host <address>    HTTP bind address (default: 0.0.0.0)
  -h, --help              Show this help message
  -v, --version           Show version

ENVIRONMENT VARIABLES:
  GOOGLE_MAPS_API_KEY       Google Maps Platform API key (required)
  GMAPS_TRANSPORT           Transport mode (stdio, http or sse)
  GMAPS_HTTP_HOST           HTTP bind address
  GMAPS_HTTP_PORT           HTTP server port
  GMAPS_REQUEST_TIMEOUT_MS  Timeout for each Google Maps request in milliseconds
  GMAPS_RETRY_BACKOFF_MS    Delay before retrying a failed request in milliseconds
  GMAPS_SESSION_IDLE_MS     Close HTTP sessions idle for this many milliseconds
  FASTMCP_TRANSPORT, FASTMCP_HOST and FASTMCP_PORT are read when the GMAPS_
  names are unset, and 'streamable-http' is accepted for 'http'.

EXAMPLES:
  # Start with stdio transport (for MCP clients)
  ${SERVER_NAME}

  # Start with streamable HTTP transport on port 8080
  ${SERVER_NAME} --transport http --port 8080
`);
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = parseArgs();

  // Apply command line overrides
  if (args.transport) {
    setConfig({ transport: args.transport });
  }
  if (args.port) {
    setConfig({ httpPort: args.port });
  }
  if (args.host) {
    setConfig({ httpHost: args.host });
  }

  const config = getConfig();
  if (!config.apiKey) {
    throw new Error('GOOGLE_MAPS_API_KEY environment variable is required');
  }

  // One provider for the whole process, shared by every session
  const context: ToolContext = {
    provider: new GoogleMapsProvider({
      apiKey: config.apiKey,
      timeoutMs: config.requestTimeoutMs,
      retry: { retries: 1, backoffMs: config.retryBackoffMs },
    }),
  };
  const serverFactory = () => createServer(context);
  const httpOptions = {
    host: config.httpHost,
    port: config.httpPort,
    sessionIdleMs: config.sessionIdleMs,
  };

  switch (config.transport) {
    case 'http':
      await startHttpTransport(serverFactory, httpOptions);
      break;
    case 'sse':
      await startSseTransport(serverFactory, httpOptions);
      break;
    case 'stdio':
      await startStdioTransport(serverFactory());
      break;
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
