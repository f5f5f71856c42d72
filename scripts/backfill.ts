#!/usr/bin/env tsx
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { loadConfig } from '../src/config.js';
import { loadRuleSet } from '../src/rules/loader.js';
import { createRuntime } from '../src/runtime.js';

const main = async () => {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('backfill')
    .usage('$0 [options]')
    .option('puuid', {
      type: 'string',
      array: true,
      alias: 'p',
      describe: 'Tracked player to backfill (repeatable)',
    })
    .option('all', {
      type: 'boolean',
      describe: 'Backfill every tracked player, including paused ones',
      default: false,
    })
    .option('evaluate-rules', {
      type: 'boolean',
      describe: 'Run the configured rules against inserted matches (sends notifications)',
      default: false,
    })
    .check((args) => {
      if (!args.all && !(args.puuid && args.puuid.length)) {
        throw new Error('Provide --puuid or --all');
      }
      return true;
    })
    .help()
    .parseAsync();

  const config = loadConfig();
  const rules = argv['evaluate-rules'] ? await loadRuleSet(config.rules.path) : [];
  const runtime = createRuntime(config, rules);

  try {
    const puuids = argv.all
      ? (await runtime.store.listPlayers()).map((player) => player.puuid)
      : argv.puuid ?? [];

    const summary = [];
    for (const puuid of puuids) {
      const report = await runtime.polling.backfillPlayer(puuid);
      console.info('backfill_player_completed', report);
      summary.push({
        puuid,
        status: report.status,
        inserted: report.inserted,
        duplicates: report.duplicates,
        filtered: report.filtered,
        failed: report.failed,
        cursor: report.cursor ? report.cursor.toISOString() : null,
      });
    }

    console.log(JSON.stringify({ players: summary }, null, 2));
    if (summary.some((entry) => entry.status === 'aborted')) {
      process.exitCode = 1;
    }
  } finally {
    await runtime.stop();
  }
};

main().catch((err) => {
  console.error('backfill_failed', err);
  process.exitCode = 1;
});
