import type { Express } from 'express';
import { z } from 'zod';

import type { AuthMiddleware } from '../auth.js';
import type { MatchApi } from '../api/client.js';
import type { PlayerPoller } from '../polling/service.js';
import { PlayerLookupError, REGIONS, type MatchStore, type PlayerUpdateInput } from '../store/index.js';
import { toPersonalRecordResponse, toPlayerResponse, toPollReportResponse } from './helpers/responders.js';

const PlayerCreateSchema = z.object({
  puuid: z.string().trim().min(1).optional(),
  game_name: z.string().trim().min(1),
  tag_line: z.string().trim().min(1),
  region: z.enum(REGIONS),
  polling_enabled: z.boolean().optional(),
});

const PlayerUpdateSchema = z
  .object({
    game_name: z.string().trim().min(1).optional(),
    tag_line: z.string().trim().min(1).optional(),
    region: z.enum(REGIONS).optional(),
    polling_enabled: z.boolean().optional(),
  })
  .refine(
    (data) =>
      data.game_name !== undefined ||
      data.tag_line !== undefined ||
      data.region !== undefined ||
      data.polling_enabled !== undefined,
    {
      message: 'At least one field is required',
      path: ['polling_enabled'],
    }
  );

const PollRequestSchema = z
  .object({
    mode: z.enum(['live', 'backfill']).default('live'),
  })
  .default({});

export interface PlayerRouteDeps {
  store: MatchStore;
  poller: PlayerPoller;
  accounts: Pick<MatchApi, 'fetchAccountByRiotId'>;
  auth: AuthMiddleware;
}

export const registerPlayerRoutes = (app: Express, deps: PlayerRouteDeps) => {
  const { store, poller, accounts, auth } = deps;

  app.get('/v1/players', auth.requireAuth, async (_req, res, next) => {
    try {
      const players = await store.listPlayers();
      return res.send({ players: players.map(toPlayerResponse) });
    } catch (err) {
      return next(err);
    }
  });

  app.post('/v1/players', auth.requireAuth, auth.requireScope('players:write'), async (req, res, next) => {
    const parsed = PlayerCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const { puuid, game_name, tag_line, region, polling_enabled } = parsed.data;

    try {
      // Without an explicit puuid the Riot ID is resolved upstream, which also fixes its casing.
      const identity = puuid
        ? { puuid, gameName: game_name, tagLine: tag_line }
        : await accounts.fetchAccountByRiotId(game_name, tag_line, region);

      const player = await store.createPlayer({
        puuid: identity.puuid,
        gameName: identity.gameName,
        tagLine: identity.tagLine,
        region,
        ...(polling_enabled !== undefined ? { pollingEnabled: polling_enabled } : {}),
      });

      console.info('player_registered', { puuid: player.puuid, region: player.region });
      return res.status(201).send({ player: toPlayerResponse(player) });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/players/:puuid', auth.requireAuth, async (req, res, next) => {
    try {
      const player = await store.getPlayer(req.params.puuid);
      if (!player) {
        throw new PlayerLookupError(`Player not found: ${req.params.puuid}`, { puuid: req.params.puuid });
      }
      return res.send({ player: toPlayerResponse(player) });
    } catch (err) {
      return next(err);
    }
  });

  app.patch('/v1/players/:puuid', auth.requireAuth, auth.requireScope('players:write'), async (req, res, next) => {
    const parsed = PlayerUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const input: PlayerUpdateInput = {};
    if (parsed.data.game_name !== undefined) input.gameName = parsed.data.game_name;
    if (parsed.data.tag_line !== undefined) input.tagLine = parsed.data.tag_line;
    if (parsed.data.region !== undefined) input.region = parsed.data.region;
    if (parsed.data.polling_enabled !== undefined) input.pollingEnabled = parsed.data.polling_enabled;

    try {
      const player = await store.updatePlayer(req.params.puuid, input);
      return res.send({ player: toPlayerResponse(player) });
    } catch (err) {
      return next(err);
    }
  });

  app.delete('/v1/players/:puuid', auth.requireAuth, auth.requireScope('players:write'), async (req, res, next) => {
    try {
      await store.removePlayer(req.params.puuid);
      console.info('player_removed', { puuid: req.params.puuid });
      return res.status(204).send();
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/players/:puuid/records', auth.requireAuth, async (req, res, next) => {
    try {
      const player = await store.getPlayer(req.params.puuid);
      if (!player) {
        throw new PlayerLookupError(`Player not found: ${req.params.puuid}`, { puuid: req.params.puuid });
      }
      const records = await store.listPersonalRecords(player.puuid);
      return res.send({ puuid: player.puuid, records: records.map(toPersonalRecordResponse) });
    } catch (err) {
      return next(err);
    }
  });

  app.delete(
    '/v1/players/:puuid/records',
    auth.requireAuth,
    auth.requireScope('players:write'),
    async (req, res, next) => {
      try {
        const player = await store.getPlayer(req.params.puuid);
        if (!player) {
          throw new PlayerLookupError(`Player not found: ${req.params.puuid}`, { puuid: req.params.puuid });
        }
        const removed = await store.resetPersonalRecords(player.puuid);
        return res.send({ puuid: player.puuid, removed });
      } catch (err) {
        return next(err);
      }
    }
  );

  app.post('/v1/players/:puuid/poll', auth.requireAuth, auth.requireScope('players:write'), async (req, res, next) => {
    const parsed = PollRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const report =
        parsed.data.mode === 'backfill'
          ? await poller.backfillPlayer(req.params.puuid)
          : await poller.pollPlayerOnce(req.params.puuid);
      return res.send({ report: toPollReportResponse(report) });
    } catch (err) {
      return next(err);
    }
  });
};
