export type PersonalRecordKind = 'max' | 'min';

export interface PersonalRecord {
  puuid: string;
  statField: string;
  kind: PersonalRecordKind;
  value: number;
  matchId: string;
  achievedAt: Date;
  updatedAt: Date;
}

export interface PersonalRecordInput {
  puuid: string;
  statField: string;
  kind: PersonalRecordKind;
  value: number;
  matchId: string;
  achievedAt: Date;
}
