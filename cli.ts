#!/usr/bin/env node

'use strict';

import Logger from './src/core/logger';
import { loadConfig, loadEnvFile } from './src/core/config';
import { errorMessage } from './src/core/errors';
import { applySchema, buildConnectionConfig, createPgClient } from './src/channels/postgres/postgres';
import { runHook } from './src/hooks/runner';
import { buildHooksConfig } from './src/hooks/settings';
import { runTelegramNotify } from './src/hooks/telegram-notify';
import { runSaveUserPrompt } from './src/hooks/save-user-prompt';
import { runSaveLlmOutput } from './src/hooks/save-llm-output';

const [,, cmd] = process.argv;

const logger = new Logger('cli');

async function initDatabase(): Promise<number> {
  loadEnvFile();
  const config = loadConfig();
  const connection = buildConnectionConfig(config.database, config.timeouts.dbMs);
  if (!connection) {
    logger.error('Missing database configuration: set CLAUDE_POSTGRES_SERVER_DSN or the CLAUDE_POSTGRES_SERVER_* variables');
    return 1;
  }

  const client = createPgClient(connection);
  let connected = false;
  try {
    await client.connect();
    connected = true;
    await applySchema(client);
    logger.info('Tables user_prompts and llm_outputs are ready');
    return 0;
  } catch (error: unknown) {
    logger.error(`Schema setup failed: ${errorMessage(error)}`);
    return 1;
  } finally {
    if (connected) {
      await client.end().catch((error: unknown) => logger.debug(`Error closing connection: ${errorMessage(error)}`));
    }
  }
}

function printUsage(): void {
  console.log('devenv-hooks — Claude Code hooks for Telegram and PostgreSQL\n');
  console.log('Usage: devenv-hooks <command>\n');
  console.log('Commands:');
  console.log('  hooks        Print Claude hooks JSON for copy-paste');
  console.log('  init-db      Create the user_prompts and llm_outputs tables');
  console.log('  notify       Run the Telegram notification flow (hook JSON on stdin)');
  console.log('  save-prompt  Run the user prompt flow (hook JSON on stdin)');
  console.log('  save-output  Run the LLM output flow (hook JSON on stdin)');
}

async function main(): Promise<void> {
  switch (cmd) {
    case 'hooks':
      console.log('\nAdd this to ~/.claude/settings.json under "hooks":');
      loadEnvFile();
      console.log(JSON.stringify(buildHooksConfig(__dirname, loadConfig().timeouts), null, 2));
      break;

    case 'init-db':
      process.exit(await initDatabase());
      break;

    case 'notify':
      await runHook('telegram-notify', runTelegramNotify);
      break;

    case 'save-prompt':
      await runHook('save-user-prompt', runSaveUserPrompt);
      break;

    case 'save-output':
      await runHook('save-llm-output', runSaveLlmOutput);
      break;

    default:
      printUsage();
      if (cmd && cmd !== 'help' && cmd !== '--help' && cmd !== '-h') {
        console.error(`\nUnknown command: ${cmd}`);
        process.exit(1);
      }
      break;
  }
}

main().catch((err: unknown) => {
  logger.error(`Fatal: ${errorMessage(err)}`);
  process.exit(1);
});
