/**
 * Context Resolver
 * Derives what the transcript does not carry: session, repository, time.
 */

import Logger from '../core/logger';
import { resolveRepository, runCommand, type CommandRunner } from './repository';
import type { AssistantMessage, HookConfig, HookInput, OutputRecord, ResolvedContext } from '../types';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface ContextOptions {
    /** Drop session ids that are not UUIDs */
    requireUuidSession?: boolean;
    runner?: CommandRunner;
    now?: () => Date;
    logger?: Logger;
}

export function isUuid(value: string): boolean {
    return UUID_PATTERN.test(value);
}

/**
 * Session id from the hook input, else the configured override. Never
 * derived from the transcript.
 */
export function resolveSessionId(
    input: HookInput,
    config: HookConfig,
    requireUuid: boolean = false,
    logger: Logger = new Logger('context')
): string | null {
    const sessionId = input.session_id?.trim() || config.sessionId;
    if (!sessionId) return null;
    if (requireUuid && !isUuid(sessionId)) {
        logger.warn(`Ignoring session id that is not a UUID: ${sessionId}`);
        return null;
    }
    return sessionId;
}

/** Hook input `cwd`, else CLAUDE_PROJECT_DIR. */
export function resolveWorkingDir(input: HookInput, config: HookConfig): string | null {
    return input.cwd?.trim() || config.projectDir;
}

export function resolveContext(input: HookInput, config: HookConfig, options: ContextOptions = {}): ResolvedContext {
    const logger = options.logger ?? new Logger('context');
    const now = options.now ?? (() => new Date());
    const cwd = resolveWorkingDir(input, config);

    return Object.freeze({
        cwd,
        sessionId: resolveSessionId(input, config, options.requireUuidSession ?? false, logger),
        repository: resolveRepository(cwd, options.runner ?? runCommand, logger),
        createdAt: now().toISOString(),
    });
}

export function buildOutputRecord(
    message: AssistantMessage,
    context: ResolvedContext,
    eventName: string | null = null
): OutputRecord {
    return Object.freeze({
        ...context,
        text: message.text,
        usage: message.usage,
        eventName,
    });
}
