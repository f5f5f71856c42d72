import { z } from 'zod';

const count = z.number().int().nonnegative();

export const ParticipantSchema = z
  .object({
    puuid: z.string().min(1),
    riotIdGameName: z.string().optional(),
    riotIdTagline: z.string().optional(),
    summonerName: z.string().optional(),
    championId: z.number().int(),
    championName: z.string(),
    teamPosition: z.string().optional(),
    individualPosition: z.string().optional(),
    teamId: z.number().int(),
    win: z.boolean(),
    kills: count,
    deaths: count,
    assists: count,
    totalDamageDealtToChampions: count,
    goldEarned: count,
    visionScore: count,
    totalMinionsKilled: count,
    timePlayed: count.optional(),
  })
  .passthrough();

export const MatchResponseSchema = z
  .object({
    metadata: z
      .object({
        matchId: z.string().min(1),
        participants: z.array(z.string()),
      })
      .passthrough(),
    info: z
      .object({
        gameCreation: z.number().int(),
        gameStartTimestamp: z.number().int().optional(),
        gameEndTimestamp: z.number().int().optional(),
        gameDuration: z.number().nonnegative(),
        gameMode: z.string(),
        gameVersion: z.string(),
        queueId: z.number().int(),
        platformId: z.string(),
        participants: z.array(ParticipantSchema).min(1),
      })
      .passthrough(),
  })
  .passthrough();

export const MatchTimelineResponseSchema = z
  .object({
    metadata: z.object({ matchId: z.string().min(1) }).passthrough(),
    info: z
      .object({
        frameInterval: z.number().int().positive(),
        frames: z.array(
          z
            .object({
              timestamp: z.number().int().nonnegative(),
              events: z.array(z.object({ type: z.string() }).passthrough()),
            })
            .passthrough()
        ),
      })
      .passthrough(),
  })
  .passthrough();

export const MatchIdsResponseSchema = z.array(z.string().min(1));

export const AccountResponseSchema = z
  .object({
    puuid: z.string().min(1),
    gameName: z.string().optional(),
    tagLine: z.string().optional(),
  })
  .passthrough();

export type MatchResponse = z.infer<typeof MatchResponseSchema>;
export type ParticipantResponse = z.infer<typeof ParticipantSchema>;
export type MatchTimelineResponse = z.infer<typeof MatchTimelineResponseSchema>;
export type AccountResponse = z.infer<typeof AccountResponseSchema>;
