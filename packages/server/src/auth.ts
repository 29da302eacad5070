import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { IncomingMessage } from 'http';
import { fail } from './http/response';

/**
 * Validates the provided token against the configured token.
 * If no token is configured, validation always passes (returns true).
 */
export function validateToken(expectedToken: string | undefined, token?: string): boolean {
  if (!expectedToken) {
    return true; // Auth disabled if no token configured
  }
  return token === expectedToken;
}

/**
 * Extracts token from Authorization header (Bearer) or query parameter 'token'.
 */
export function extractToken(req: Request | IncomingMessage): string | undefined {
  const authHeader = req.headers['authorization'];
  if (authHeader) {
    const headerValue = Array.isArray(authHeader) ? authHeader[0] : authHeader;
    if (headerValue && headerValue.startsWith('Bearer ')) {
      return headerValue.substring(7);
    }
  }

  // Express has already parsed the query; a WebSocket upgrade has only the raw url
  if (!req.url) return undefined;
  try {
    const url = new URL(req.url, 'http://localhost');
    return url.searchParams.get('token') ?? undefined;
  } catch (err) {
    console.warn('[auth] Unparseable request url:', err instanceof Error ? err.message : err);
    return undefined;
  }
}

/**
 * Express middleware to enforce authentication if a token is configured.
 */
export function authenticate(expectedToken: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expectedToken) {
      next();
      return;
    }

    const token = extractToken(req);
    if (!token || !validateToken(expectedToken, token)) {
      console.warn(`[auth] Unauthorized access attempt from ${req.ip}`);
      fail(res, 'UNAUTHORIZED', 'Missing or invalid token');
      return;
    }

    next();
  };
}
