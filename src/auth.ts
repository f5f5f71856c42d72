import type { Request, RequestHandler } from 'express';
import { auth } from 'express-oauth2-jwt-bearer';
import jwt from 'jsonwebtoken';

import type { AuthConfig } from './config.js';
import { consoleLogger, type Logger } from './logger.js';

export interface Principal {
  subject: string;
  scopes: string[];
}

export interface AuthMiddleware {
  disabled: boolean;
  requireAuth: RequestHandler;
  requireScope(scope: string): RequestHandler;
  getPrincipal(req: Request): Principal | null;
}

const DISABLED_PRINCIPAL: Principal = { subject: 'disabled', scopes: [] };

const parseScopes = (value: unknown) =>
  typeof value === 'string' ? value.split(' ').filter(Boolean) : [];

const toPrincipal = (payload: { sub?: unknown; scope?: unknown }): Principal => ({
  subject: typeof payload.sub === 'string' ? payload.sub : 'unknown_sub',
  scopes: parseScopes(payload.scope),
});

/**
 * Bearer authentication for the admin API: Auth0 (RS256) when an audience and
 * domain are configured, an HS256 shared secret when `AUTH_PROVIDER=DEV`, and a
 * pass-through when neither is configured or `AUTH_DISABLE=1`.
 */
export const createAuth = (config: AuthConfig, logger: Logger = consoleLogger): AuthMiddleware => {
  const principals = new WeakMap<Request, Principal>();

  const createDevJwtMiddleware = (secret: string): RequestHandler => (req, res, next) => {
    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return res.status(401).send({ error: 'missing_token', message: 'Authorization header missing bearer token.' });
    }

    const token = authHeader.slice('Bearer '.length);
    const verifyOptions: jwt.VerifyOptions & { complete?: false } = { algorithms: ['HS256'] };
    if (config.devAudience) verifyOptions.audience = config.devAudience;
    if (config.devIssuer) verifyOptions.issuer = config.devIssuer;

    try {
      const payload = jwt.verify(token, secret, verifyOptions);
      if (typeof payload === 'string') {
        return res.status(401).send({ error: 'invalid_token', message: 'Token payload must be a JSON object.' });
      }
      principals.set(req, toPrincipal(payload));
      return next();
    } catch (err) {
      logger.warn('dev_auth_invalid_token', { message: err instanceof Error ? err.message : String(err) });
      return res.status(401).send({ error: 'invalid_token', message: 'Invalid or expired token.' });
    }
  };

  const createAuth0Middleware = (audience: string, domain: string): RequestHandler => {
    const verify = auth({ audience, issuerBaseURL: `https://${domain}`, tokenSigningAlg: 'RS256' });
    return (req, res, next) => {
      verify(req, res, (err?: unknown) => {
        if (err) return next(err);
        if (req.auth) principals.set(req, toPrincipal(req.auth.payload));
        return next();
      });
    };
  };

  const passthrough: RequestHandler = (_req, _res, next) => next();

  let requireAuth: RequestHandler = passthrough;
  if (!config.disabled) {
    if (config.provider === 'DEV' && config.devSharedSecret) {
      requireAuth = createDevJwtMiddleware(config.devSharedSecret);
    } else if (config.auth0Audience && config.auth0Domain) {
      requireAuth = createAuth0Middleware(config.auth0Audience, config.auth0Domain);
    }
  }

  const getPrincipal = (req: Request) => (config.disabled ? DISABLED_PRINCIPAL : principals.get(req) ?? null);

  const requireScope = (scope: string): RequestHandler => (req, res, next) => {
    if (config.disabled) return next();
    const principal = getPrincipal(req);
    if (!principal || !principal.scopes.includes(scope)) {
      logger.warn('insufficient_scope', { subject: principal?.subject ?? null, required: scope });
      return res.status(403).send({ error: 'insufficient_scope', required: scope });
    }
    return next();
  };

  return { disabled: config.disabled, requireAuth, requireScope, getPrincipal };
};
