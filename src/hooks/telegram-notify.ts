/**
 * Stop / Notification flow: send Claude's last response to Telegram.
 * Best effort. A failure here is logged and never surfaces as a crash of
 * the assistant runtime.
 */

import Logger from '../core/logger';
import { missingTelegramSettings } from '../core/config';
import { errorMessage } from '../core/errors';
import TelegramChannel from '../channels/telegram/telegram';
import { buildOutputRecord, resolveContext } from '../context/resolver';
import { dispatch } from '../dispatch/dispatcher';
import { NOTIFY_ONLY } from '../dispatch/policy';
import { readLastAssistantMessage } from '../transcript/reader';
import { parseHookInputLenient, type HookDeps } from './input';
import { EXIT_FAILURE, EXIT_OK, type AssistantMessage, type ExitCode, type HookConfig, type HookInput } from '../types';

async function findMessage(input: HookInput, logger: Logger): Promise<AssistantMessage | null> {
    if (input.transcript_path) {
        try {
            const result = await readLastAssistantMessage(input.transcript_path, logger);
            if (result.status === 'found') return result.message;
            if (result.status === 'missing') {
                logger.warn(`Transcript not found: ${result.path}`);
            } else {
                logger.warn('No assistant message found in transcript');
            }
        } catch (error: unknown) {
            logger.error(`Could not read transcript: ${errorMessage(error)}`);
        }
    }

    // Notification events carry their own text
    const notice = input.message?.trim();
    return notice ? { text: notice, usage: null } : null;
}

export async function runTelegramNotify(rawInput: string, config: HookConfig, deps: HookDeps = {}): Promise<ExitCode> {
    const logger = deps.logger ?? new Logger('hook:telegram');

    const { botToken, chatId } = config.telegram;
    if (!botToken || !chatId) {
        logger.warn(`Telegram not configured, missing: ${missingTelegramSettings(config).join(', ')}`);
        return EXIT_FAILURE;
    }

    const input = parseHookInputLenient(rawInput, logger);
    const message = await findMessage(input, logger);
    if (!message) {
        logger.info('Nothing to send');
        return EXIT_OK;
    }

    const context = resolveContext(input, config, { runner: deps.runner, now: deps.now, logger });
    const record = buildOutputRecord(message, context, input.hook_event_name ?? null);

    const channel = new TelegramChannel(
        { botToken, chatId, forceIPv4: config.telegram.forceIPv4, timeoutMs: config.timeouts.httpMs },
        deps.transport
    );

    const outcome = await dispatch(record, NOTIFY_ONLY, { primary: channel }, logger);
    return outcome.status === 'delivered' ? EXIT_OK : EXIT_FAILURE;
}
