#!/usr/bin/env tsx
import 'dotenv/config';
import jwt from 'jsonwebtoken';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

const DEFAULT_ISSUER = 'match-watch-dev';

/** Signs an HS256 token accepted by the admin API when `AUTH_PROVIDER=DEV`. */
const main = async () => {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('mint-dev-token')
    .usage('$0 [options]')
    .option('subject', {
      type: 'string',
      alias: 's',
      describe: 'Subject (sub) claim',
      default: 'dev-operator',
    })
    .option('scope', {
      type: 'string',
      array: true,
      alias: 'S',
      describe: 'Scopes to grant (repeatable, or one quoted space-separated list)',
      default: ['players:write'],
    })
    .option('expires-in', {
      type: 'number',
      alias: 'e',
      describe: 'Lifetime in seconds',
      default: 3600,
    })
    .option('json', {
      type: 'boolean',
      describe: 'Print the decoded claims alongside the token',
      default: false,
    })
    .help()
    .parseAsync();

  const secret = process.env.AUTH_DEV_SHARED_SECRET;
  if (!secret) {
    throw new Error('AUTH_DEV_SHARED_SECRET is not set');
  }

  const scope = argv.scope
    .flatMap((entry) => entry.split(/[\s,]+/))
    .filter(Boolean)
    .join(' ');

  const signOptions: jwt.SignOptions = {
    algorithm: 'HS256',
    subject: argv.subject,
    issuer: process.env.AUTH_DEV_ISSUER ?? DEFAULT_ISSUER,
    expiresIn: argv['expires-in'],
  };
  if (process.env.AUTH_DEV_AUDIENCE) signOptions.audience = process.env.AUTH_DEV_AUDIENCE;

  const token = jwt.sign({ scope }, secret, signOptions);

  if (!argv.json) {
    console.log(token);
    return;
  }
  console.log(JSON.stringify({ token, claims: jwt.decode(token) }, null, 2));
};

main().catch((err) => {
  console.error('mint_dev_token_failed', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
