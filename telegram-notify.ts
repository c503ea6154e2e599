#!/usr/bin/env node

/**
 * Stop / Notification hook — sends Claude's last response to Telegram.
 *
 * Usage (in ~/.claude/settings.json hooks):
 *   node /path/to/devenv-hooks/dist/telegram-notify.js
 *
 * No stdout output. Exit 1 means "not sent"; it never blocks Claude.
 */

import { runHook } from './src/hooks/runner';
import { runTelegramNotify } from './src/hooks/telegram-notify';

runHook('telegram-notify', runTelegramNotify).catch((err: unknown) => {
    console.error(`Fatal: ${String(err)}`);
    process.exit(1);
});
