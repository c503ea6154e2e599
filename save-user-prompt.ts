#!/usr/bin/env node

/**
 * UserPromptSubmit hook — stores every submitted prompt.
 *
 * PostgreSQL when configured, otherwise (or when the database fails) the
 * YAML file at CLAUDE_USER_PROMPTS_FILE. Must be fast and print nothing:
 * UserPromptSubmit stdout is added to Claude's context.
 */

import { runHook } from './src/hooks/runner';
import { runSaveUserPrompt } from './src/hooks/save-user-prompt';

runHook('save-user-prompt', runSaveUserPrompt).catch((err: unknown) => {
    console.error(`Fatal: ${String(err)}`);
    process.exit(1);
});
