#!/usr/bin/env node

/**
 * Stop hook — stores Claude's last response, with token usage and model,
 * in the llm_outputs table.
 */

import { runHook } from './src/hooks/runner';
import { runSaveLlmOutput } from './src/hooks/save-llm-output';

runHook('save-llm-output', runSaveLlmOutput).catch((err: unknown) => {
    console.error(`Fatal: ${String(err)}`);
    process.exit(1);
});
