/**
 * Stop flow: store Claude's last response and its usage in PostgreSQL.
 * There is no fallback sink; a missing database or a failed insert fails
 * the run.
 */

import Logger from '../core/logger';
import { errorMessage } from '../core/errors';
import PostgresChannel, { buildConnectionConfig } from '../channels/postgres/postgres';
import { buildOutputRecord, resolveContext } from '../context/resolver';
import { dispatch } from '../dispatch/dispatcher';
import { LLM_OUTPUT_POLICY } from '../dispatch/policy';
import { readLastAssistantMessage, type TranscriptReadResult } from '../transcript/reader';
import { parseHookInput, type HookDeps } from './input';
import { EXIT_FAILURE, EXIT_OK, type ExitCode, type HookConfig, type HookInput } from '../types';

export async function runSaveLlmOutput(rawInput: string, config: HookConfig, deps: HookDeps = {}): Promise<ExitCode> {
    const logger = deps.logger ?? new Logger('hook:llm-output');

    let input: HookInput;
    try {
        input = parseHookInput(rawInput);
    } catch (error: unknown) {
        logger.error(errorMessage(error));
        return EXIT_FAILURE;
    }

    if (!input.transcript_path) {
        logger.error('Hook input has no transcript_path');
        return EXIT_FAILURE;
    }

    let result: TranscriptReadResult;
    try {
        result = await readLastAssistantMessage(input.transcript_path, logger);
    } catch (error: unknown) {
        logger.error(errorMessage(error));
        return EXIT_FAILURE;
    }

    if (result.status === 'missing') {
        logger.error(`Transcript not found: ${result.path}`);
        return EXIT_FAILURE;
    }
    if (result.status === 'no-message') {
        logger.warn('No assistant message found in transcript, nothing to save');
        return EXIT_OK;
    }

    const context = resolveContext(input, config, { runner: deps.runner, now: deps.now, logger });
    const record = buildOutputRecord(result.message, context, input.hook_event_name ?? null);

    const connection = buildConnectionConfig(config.database, config.timeouts.dbMs);
    const outcome = await dispatch(record, LLM_OUTPUT_POLICY, {
        primary: connection ? new PostgresChannel(connection, 'llm_outputs', deps.createClient) : null,
    }, logger);

    return outcome.status === 'delivered' ? EXIT_OK : EXIT_FAILURE;
}
