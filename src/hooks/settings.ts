/**
 * The settings.json "hooks" block that registers the hook scripts.
 *
 * Each hook's timeout covers the worst case of its own flow, so the runtime
 * never kills a run before the flow has given up on a sink by itself. For
 * the prompt flow that includes the YAML fallback after a database timeout.
 */

import path from 'path';
import { GIT_TIMEOUT_MS } from '../context/repository';
import { LOCK_TIMEOUT_MS } from '../utils/file-lock';
import { STDIN_TIMEOUT_MS } from '../utils/stdin';
import type { TimeoutSettings } from '../types';

/** Process start-up and module loading */
const STARTUP_MARGIN_MS = 1000;

export interface HookDefinition {
    event: 'UserPromptSubmit' | 'Stop' | 'Notification';
    script: string;
    /** Longest the flow can take, in milliseconds */
    budgetMs: (timeouts: TimeoutSettings) => number;
}

export interface HookCommand {
    type: 'command';
    command: string;
    /** Seconds */
    timeout: number;
}

export type HooksSettings = Record<string, Array<{ hooks: HookCommand[] }>>;

const READ_INPUT_MS = STDIN_TIMEOUT_MS + GIT_TIMEOUT_MS;

// connect and insert each get the full database timeout
const promptBudget = (t: TimeoutSettings) => READ_INPUT_MS + 2 * t.dbMs + LOCK_TIMEOUT_MS;
const outputBudget = (t: TimeoutSettings) => READ_INPUT_MS + 2 * t.dbMs;
// a Markdown rejection costs a second request
const notifyBudget = (t: TimeoutSettings) => READ_INPUT_MS + 2 * t.httpMs;

export const HOOK_DEFINITIONS: readonly HookDefinition[] = [
    { event: 'UserPromptSubmit', script: 'save-user-prompt.js', budgetMs: promptBudget },
    { event: 'Stop', script: 'save-llm-output.js', budgetMs: outputBudget },
    { event: 'Stop', script: 'telegram-notify.js', budgetMs: notifyBudget },
    { event: 'Notification', script: 'telegram-notify.js', budgetMs: notifyBudget },
];

export function hookTimeoutSeconds(definition: HookDefinition, timeouts: TimeoutSettings): number {
    return Math.ceil((definition.budgetMs(timeouts) + STARTUP_MARGIN_MS) / 1000);
}

/**
 * The hooks block for the compiled scripts in `distDir`. The script path
 * is quoted so install paths with spaces survive the shell.
 */
export function buildHooksConfig(distDir: string, timeouts: TimeoutSettings): HooksSettings {
    const hooks: HooksSettings = {};
    for (const definition of HOOK_DEFINITIONS) {
        const command = `node ${JSON.stringify(path.join(distDir, definition.script))}`;
        hooks[definition.event] = hooks[definition.event] || [];
        hooks[definition.event].push({
            hooks: [{ type: 'command', command, timeout: hookTimeoutSeconds(definition, timeouts) }],
        });
    }
    return hooks;
}
