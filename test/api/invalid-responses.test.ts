import { afterEach, beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { FileInvalidResponseSink, LogInvalidResponseSink } from '../../src/api/invalid-responses.js';
import { createRecordingLogger } from '../helpers/logger.js';

const report = {
  endpoint: 'match/v5 ids',
  url: 'https://europe.api.riotgames.com/lol/match/v5/matches/EUW1_1',
  statusCode: 200,
  errorMessage: 'Malformed match response',
  issues: ['info: Required'],
  responseBody: { metadata: { matchId: 'EUW1_1' } },
};

let directory: string;

beforeEach(async () => {
  directory = await mkdtemp(join(tmpdir(), 'invalid-responses-'));
});

afterEach(async () => {
  await rm(directory, { recursive: true, force: true });
});

test('FileInvalidResponseSink writes one json artifact per report', async () => {
  const target = join(directory, 'nested');
  const sink = new FileInvalidResponseSink(target, () => new Date('2024-01-02T03:04:05.678Z'));

  await sink.record(report);

  const files = await readdir(target);
  assert.deepEqual(files, ['2024-01-02T03-04-05-678Z_match_v5_ids.json']);

  const written: unknown = JSON.parse(await readFile(join(target, files[0]), 'utf8'));
  assert.deepEqual(written, {
    timestamp: '2024-01-02T03:04:05.678Z',
    endpoint: 'match/v5 ids',
    url: 'https://europe.api.riotgames.com/lol/match/v5/matches/EUW1_1',
    status_code: 200,
    error_message: 'Malformed match response',
    issues: ['info: Required'],
    response_body: { metadata: { matchId: 'EUW1_1' } },
  });
});

test('LogInvalidResponseSink logs the report as a warning', async () => {
  const { logger, entries } = createRecordingLogger();

  await new LogInvalidResponseSink(logger).record(report);

  assert.deepEqual(entries, [
    {
      level: 'warn',
      event: 'invalid_response',
      context: {
        endpoint: 'match/v5 ids',
        url: 'https://europe.api.riotgames.com/lol/match/v5/matches/EUW1_1',
        statusCode: 200,
        issues: ['info: Required'],
      },
    },
  ]);
});
