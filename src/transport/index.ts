export {
  closeServer,
  createMcpHttpServer,
  startHttpTransport,
  type HttpTransportOptions,
  type ServerFactory,
} from './http.js';
export { createSseHttpServer, startSseTransport } from './sse.js';
export { startStdioTransport } from './stdio.js';
