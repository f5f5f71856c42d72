import dotenv from 'dotenv';

import { ConfigError, loadConfig } from './config.js';
import { RuleConfigError, loadRuleSet } from './rules/loader.js';
import { createRuntime } from './runtime.js';

dotenv.config();

const main = async () => {
  const config = loadConfig();
  const rules = await loadRuleSet(config.rules.path);
  const runtime = createRuntime(config, rules);

  const server = runtime.app.listen(config.port, () => console.log(`match-watch listening on :${config.port}`));
  runtime.start();

  const shutdown = (signal: string) => {
    console.info('shutdown_requested', { signal });
    server.close();
    runtime.stop().catch((err) => {
      console.error('shutdown_failed', err);
      process.exitCode = 1;
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
};

main().catch((err) => {
  if (err instanceof ConfigError || err instanceof RuleConfigError) {
    console.error('startup_config_invalid', { message: err.message, issues: err.issues });
  } else {
    console.error('startup_failed', err);
  }
  process.exitCode = 1;
});
