import type { Express } from 'express';

import type { MatchStore } from '../store/index.js';

export const registerHealthRoutes = (app: Express, deps: { store: MatchStore }) => {
  app.get('/health', async (_req, res) => {
    try {
      await deps.store.ping();
      return res.status(200).send({ ok: true });
    } catch (err) {
      console.error('health_check_failed', err instanceof Error ? err.message : err);
      return res.status(503).send({ ok: false, error: 'store_unavailable' });
    }
  });
};
