import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { isTokenAuthorizationError, TokenAuthorizationError } from '../errors/errors.js';
import { debugAuth } from '../utils/debug.js';
import type { TokenVerifier, VerifiedToken } from './token-verifier.js';

declare global {
  namespace Express {
    interface Request {
      /** Set by the authorization middleware once the bearer token is verified */
      auth?: VerifiedToken;
    }
  }
}

const BEARER = /^Bearer[ ]+([^\s]+)\s*$/i;

/** Token of an `Authorization: Bearer <token>` header, if well formed. */
export function extractBearerToken(header: string | undefined): string | undefined {
  return header?.match(BEARER)?.[1];
}

function reject(res: Response, error: TokenAuthorizationError): void {
  res.status(401).set('WWW-Authenticate', 'Bearer').json({ error: 'Unauthorized' });
  debugAuth('request rejected: %s', error.message);
}

/**
 * Gate every request behind a verified bearer token. Rejections are answered with
 * 401; any other failure goes to the error handler.
 */
export function createAuthMiddleware(verifier: TokenVerifier): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      reject(res, TokenAuthorizationError.missingToken());
      return;
    }

    try {
      req.auth = await verifier.verify(token);
    } catch (err) {
      if (isTokenAuthorizationError(err)) {
        reject(res, err);
        return;
      }
      throw err;
    }
    next();
  };
}
