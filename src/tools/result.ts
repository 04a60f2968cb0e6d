import { toProviderError } from '../provider/errors.js';
import type { Shaped } from '../shapers.js';
import type { ErrorResult, ToolResult } from '../types.js';
import type { ValidationError } from '../validators.js';

// Errors caused by the caller's arguments. They render as a bare {"error": ...}.
const CALLER_ERROR_CODES = new Set(['INVALID_ENUM', 'VALIDATION_ERROR', 'UNKNOWN_TOOL']);

/**
 * JSON text for a tool payload. A Map renders as an object whose keys keep
 * insertion order, including integer-like names that a plain object would
 * move to the front.
 */
export function toJson(value: unknown): string {
  if (value instanceof Map) {
    const members = [...value].map(
      ([key, entry]: [unknown, unknown]) => `${JSON.stringify(String(key))}:${toJson(entry)}`
    );
    return `{${members.join(',')}}`;
  }
  return JSON.stringify(value);
}

export function fromShaped<T>(shaped: Shaped<T>): ToolResult<T> {
  if (shaped.found) {
    return { status: 'ok', data: shaped.data };
  }
  return { status: 'not_found', message: shaped.message };
}

export function errorResult(code: string, message: string): ErrorResult {
  return { status: 'error', error: { code, message } };
}

export function invalidInput(error: ValidationError): ErrorResult {
  return errorResult(error.code, error.message);
}

export function providerFailure(toolName: string, error: unknown): ErrorResult {
  const providerError = toProviderError(error);
  console.error(`${toolName} failed: ${providerError.message}`);
  return errorResult(providerError.code, providerError.message);
}

/**
 * Render a tool result as the text sent back to the client: compact JSON on
 * success, the plain sentinel when nothing was found, and an error object
 * otherwise.
 */
export function renderToolResult(result: ToolResult<unknown>): { text: string; isError: boolean } {
  switch (result.status) {
    case 'ok':
      return { text: toJson(result.data), isError: false };
    case 'not_found':
      return { text: result.message, isError: false };
    case 'error': {
      const { code, message } = result.error;
      const payload = CALLER_ERROR_CODES.has(code) ? { error: message } : { error: message, code };
      return { text: JSON.stringify(payload), isError: true };
    }
  }
}
