/**
 * UserPromptSubmit flow: store the submitted prompt in PostgreSQL, or in
 * the YAML fallback file when the database is not configured or fails.
 */

import Logger from '../core/logger';
import { errorMessage } from '../core/errors';
import PostgresChannel, { buildConnectionConfig } from '../channels/postgres/postgres';
import YamlFileChannel from '../channels/yaml/yaml-file';
import { buildOutputRecord, resolveContext } from '../context/resolver';
import { dispatch } from '../dispatch/dispatcher';
import { USER_PROMPT_POLICY } from '../dispatch/policy';
import { parseHookInput, type HookDeps } from './input';
import { EXIT_FAILURE, EXIT_OK, type ExitCode, type HookConfig, type HookInput } from '../types';

export async function runSaveUserPrompt(rawInput: string, config: HookConfig, deps: HookDeps = {}): Promise<ExitCode> {
    const logger = deps.logger ?? new Logger('hook:user-prompt');

    let input: HookInput;
    try {
        input = parseHookInput(rawInput);
    } catch (error: unknown) {
        logger.error(errorMessage(error));
        return EXIT_FAILURE;
    }

    const prompt = input.prompt ?? '';
    if (!prompt.trim()) {
        logger.warn('Hook input has no prompt, nothing to save');
        return EXIT_OK;
    }

    const context = resolveContext(input, config, {
        requireUuidSession: true,
        runner: deps.runner,
        now: deps.now,
        logger,
    });
    const record = buildOutputRecord({ text: prompt, usage: null }, context, input.hook_event_name ?? null);

    const connection = buildConnectionConfig(config.database, config.timeouts.dbMs);
    if (!connection) {
        logger.info('PostgreSQL not configured, using YAML storage');
    }

    const outcome = await dispatch(record, USER_PROMPT_POLICY, {
        primary: connection ? new PostgresChannel(connection, 'user_prompts', deps.createClient) : null,
        fallback: new YamlFileChannel(config.fallbackFile),
    }, logger);

    return outcome.status === 'failed' ? EXIT_FAILURE : EXIT_OK;
}
