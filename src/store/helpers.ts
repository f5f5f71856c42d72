import type { MatchParticipantStats, MatchRecord, PersonalRecordInput } from './types.js';
import { DataIntegrityError } from './errors.js';

const NUMERIC_STATS = [
  'kills',
  'deaths',
  'assists',
  'totalDamageDealtToChampions',
  'goldEarned',
  'visionScore',
  'totalMinionsKilled',
] as const satisfies ReadonlyArray<keyof MatchParticipantStats>;

export const assertValidMatch = (record: MatchRecord) => {
  if (!record.matchId.trim()) {
    throw new DataIntegrityError('Match id must not be empty', 'invalid_match');
  }
  if (Number.isNaN(record.startedAt.getTime())) {
    throw new DataIntegrityError(`Match ${record.matchId} has an invalid start time`, 'invalid_match', {
      matchId: record.matchId,
    });
  }
  if (!Number.isFinite(record.durationSeconds) || record.durationSeconds < 0) {
    throw new DataIntegrityError(`Match ${record.matchId} has an invalid duration`, 'invalid_match', {
      matchId: record.matchId,
      durationSeconds: record.durationSeconds,
    });
  }
  if (!record.participants.length) {
    throw new DataIntegrityError(`Match ${record.matchId} has no participants`, 'invalid_match', {
      matchId: record.matchId,
    });
  }

  for (const participant of record.participants) {
    for (const field of NUMERIC_STATS) {
      const value = participant[field];
      if (!Number.isFinite(value)) {
        throw new DataIntegrityError(`Match ${record.matchId} has a non-numeric ${field}`, 'invalid_match', {
          matchId: record.matchId,
          puuid: participant.puuid,
          field,
        });
      }
    }
  }
};

export const assertValidRecord = (input: PersonalRecordInput) => {
  if (!Number.isFinite(input.value)) {
    throw new DataIntegrityError(`Personal record ${input.statField} must be a finite number`, 'invalid_record', {
      puuid: input.puuid,
      statField: input.statField,
    });
  }
};
