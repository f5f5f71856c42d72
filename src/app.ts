import express from 'express';
import type { Express, ErrorRequestHandler } from 'express';
import { UnauthorizedError } from 'express-oauth2-jwt-bearer';

import type { AuthMiddleware } from './auth.js';
import type { MatchApi } from './api/client.js';
import { ApiError, PermanentApiError } from './api/errors.js';
import type { PlayerPoller } from './polling/service.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerMatchRoutes } from './routes/matches.js';
import { registerPlayerRoutes } from './routes/players.js';
import {
  MatchLookupError,
  PlayerConflictError,
  PlayerLookupError,
  type MatchStore,
} from './store/index.js';

export interface AppDeps {
  store: MatchStore;
  poller: PlayerPoller;
  accounts: Pick<MatchApi, 'fetchAccountByRiotId'>;
  auth: AuthMiddleware;
}

const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  const payload = serializeError(err);
  if (payload.log) {
    console.error(payload.log.context, payload.log.error);
  }

  res.status(payload.status).json(payload.body);
};

const isBodyParseError = (err: unknown) =>
  err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';

export const serializeError = (err: unknown): {
  status: number;
  body: Record<string, unknown>;
  log?: { error: unknown; context: string };
} => {
  if (err instanceof PlayerLookupError) {
    return {
      status: 404,
      body: {
        error: 'player_not_found',
        message: err.message,
        ...(err.context.puuid ? { context: err.context } : {}),
      },
    };
  }

  if (err instanceof MatchLookupError) {
    return { status: 404, body: { error: 'match_not_found', message: err.message } };
  }

  if (err instanceof PlayerConflictError) {
    return { status: 409, body: { error: 'player_exists', message: err.message, puuid: err.puuid } };
  }

  if (err instanceof PermanentApiError && err.reason === 'not_found') {
    return { status: 404, body: { error: 'account_not_found', message: err.message } };
  }

  if (err instanceof ApiError) {
    return {
      status: 502,
      body: { error: 'upstream_error', message: err.message, endpoint: err.details.endpoint },
      log: { error: err, context: 'upstream_error' },
    };
  }

  if (err instanceof UnauthorizedError) {
    return { status: err.status, body: { error: 'unauthorized', message: err.message } };
  }

  if (isBodyParseError(err)) {
    return { status: 400, body: { error: 'invalid_json', message: 'Request body is not valid JSON' } };
  }

  return {
    status: 500,
    body: { error: 'internal_error', message: 'Unexpected error' },
    log: { error: err, context: 'unhandled_error' },
  };
};

export const createApp = (deps: AppDeps): Express => {
  const app = express();
  app.use(express.json());

  registerHealthRoutes(app, { store: deps.store });
  registerPlayerRoutes(app, deps);
  registerMatchRoutes(app, { store: deps.store, auth: deps.auth });

  app.use(errorHandler);

  return app;
};
