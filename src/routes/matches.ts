import type { Express } from 'express';
import { z } from 'zod';

import type { AuthMiddleware } from '../auth.js';
import { MatchLookupError, type MatchStore } from '../store/index.js';
import { toMatchResponse } from './helpers/responders.js';

const MatchGetQuerySchema = z.object({
  include_raw: z.enum(['0', '1', 'true', 'false']).optional(),
});

export const registerMatchRoutes = (app: Express, deps: { store: MatchStore; auth: AuthMiddleware }) => {
  const { store, auth } = deps;

  app.get('/v1/matches/:matchId', auth.requireAuth, async (req, res, next) => {
    const parsed = MatchGetQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const match = await store.getMatch(req.params.matchId);
      if (!match) {
        throw new MatchLookupError(`Match not found: ${req.params.matchId}`);
      }
      const includeRaw = parsed.data.include_raw === '1' || parsed.data.include_raw === 'true';
      return res.send({ match: toMatchResponse(match, { includeRaw }) });
    } catch (err) {
      return next(err);
    }
  });
};
