/**
 * HTTP utility functions for the API server
 */

import type { IncomingMessage, ServerResponse } from 'http';

const MAX_BODY_BYTES = 1024 * 1024;

/**
 * Send a JSON response with the given status code and payload
 */
export function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(payload));
}

/**
 * Send an error response with the given status code and message
 */
export function sendError(res: ServerResponse, status: number, message: string): void {
  sendJson(res, status, { error: message });
}

export type JsonBody = { ok: true; value: unknown } | { ok: false; reason: string };

/**
 * Read and parse a JSON request body.
 * Empty bodies parse as an empty object.
 */
export function parseJsonBody(req: IncomingMessage): Promise<JsonBody> {
  return new Promise((resolve) => {
    let body = '';
    let size = 0;
    let done = false;

    const finish = (result: JsonBody): void => {
      if (done) return;
      done = true;
      resolve(result);
    };

    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        finish({ ok: false, reason: 'Request body too large' });
        req.destroy();
        return;
      }
      body += chunk.toString();
    });
    req.on('end', () => {
      if (!body) {
        finish({ ok: true, value: {} });
        return;
      }
      try {
        finish({ ok: true, value: JSON.parse(body) });
      } catch {
        finish({ ok: false, reason: 'Invalid JSON body' });
      }
    });
    req.on('error', (error) => {
      finish({ ok: false, reason: error.message });
    });
  });
}

/**
 * Set CORS headers on a response
 */
export function setCorsHeaders(res: ServerResponse): void {
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
}

/**
 * Parse a positive integer query parameter, falling back when absent or invalid
 */
export function parseLimit(value: string | null, fallback: number, max: number = 100): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) return fallback;
  return Math.min(parsed, max);
}

function decodePathPart(part: string): string | null {
  try {
    return decodeURIComponent(part);
  } catch (error) {
    if (error instanceof URIError) return null;
    throw error;
  }
}

/**
 * Extract path parameters from a URL pathname using a pattern
 * Pattern uses :param syntax, e.g., '/api/config/overrides/:path'
 * Returns null if the pattern doesn't match or a parameter is badly escaped
 */
export function matchPath(pathname: string, pattern: string): Record<string, string> | null {
  const patternParts = pattern.split('/');
  const pathParts = pathname.split('/');

  if (patternParts.length !== pathParts.length) {
    return null;
  }

  const params: Record<string, string> = {};

  for (let i = 0; i < patternParts.length; i++) {
    const patternPart = patternParts[i];
    const pathPart = pathParts[i];

    if (patternPart.startsWith(':')) {
      const decoded = decodePathPart(pathPart);
      if (decoded === null) return null;
      params[patternPart.slice(1)] = decoded;
    } else if (patternPart !== pathPart) {
      return null;
    }
  }

  return params;
}
