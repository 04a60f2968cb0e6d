/**
 * Configuration management for the Google Maps tools MCP server
 */

export type TransportMode = 'stdio' | 'http' | 'sse';

const TRANSPORT_MODES: readonly TransportMode[] = ['stdio', 'http', 'sse'];

export interface Config {
  apiKey: string;
  transport: TransportMode;
  httpHost: string;
  httpPort: number;
  requestTimeoutMs: number;
  retryBackoffMs: number;
  sessionIdleMs: number;
}

// Names still accepted from older deployments, read when the primary one is unset.
const ENV_ALIASES = new Map<string, string>([
  ['GMAPS_TRANSPORT', 'FASTMCP_TRANSPORT'],
  ['GMAPS_HTTP_HOST', 'FASTMCP_HOST'],
  ['GMAPS_HTTP_PORT', 'FASTMCP_PORT'],
]);

// Transport spellings used by other MCP server launchers.
const TRANSPORT_ALIASES = new Map<string, TransportMode>([['streamable-http', 'http']]);

function readEnv(key: string): { name: string; value: string } | undefined {
  const value = process.env[key];
  if (value !== undefined) {
    return { name: key, value };
  }
  const alias = ENV_ALIASES.get(key);
  const aliasValue = alias ? process.env[alias] : undefined;
  return alias && aliasValue !== undefined ? { name: alias, value: aliasValue } : undefined;
}

function getEnv(key: string, defaultValue: string): string {
  return readEnv(key)?.value ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const entry = readEnv(key);
  if (entry === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(entry.value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function parseTransport(value: string): TransportMode | undefined {
  return TRANSPORT_MODES.find((mode) => mode === value) ?? TRANSPORT_ALIASES.get(value);
}

function getEnvTransport(key: string, defaultValue: TransportMode): TransportMode {
  const entry = readEnv(key);
  if (entry === undefined) {
    return defaultValue;
  }
  const transport = parseTransport(entry.value);
  if (!transport) {
    console.error(`Unknown ${entry.name} '${entry.value}', falling back to ${defaultValue}`);
    return defaultValue;
  }
  return transport;
}

export function loadConfig(): Config {
  return {
    apiKey: getEnv('GOOGLE_MAPS_API_KEY', ''),
    transport: getEnvTransport('GMAPS_TRANSPORT', 'stdio'),
    httpHost: getEnv('GMAPS_HTTP_HOST', '0.0.0.0'),
    httpPort: getEnvNumber('GMAPS_HTTP_PORT', 8080),
    requestTimeoutMs: getEnvNumber('GMAPS_REQUEST_TIMEOUT_MS', 10000),
    retryBackoffMs: getEnvNumber('GMAPS_RETRY_BACKOFF_MS', 500),
    sessionIdleMs: getEnvNumber('GMAPS_SESSION_IDLE_MS', 30 * 60 * 1000),
  };
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export function setConfig(config: Partial<Config>): void {
  configInstance = { ...getConfig(), ...config };
}

export function resetConfig(): void {
  configInstance = null;
}
