/**
 * Hook stdin parsing and the collaborators a flow can be handed.
 */

import Logger from '../core/logger';
import { HookInputError, errorMessage } from '../core/errors';
import { HookInputSchema, type HookInput } from '../types';
import type { CommandRunner } from '../context/repository';
import type { ClientFactory } from '../channels/postgres/postgres';
import type { HttpTransport } from '../utils/http-request';

export interface HookDeps {
    logger?: Logger;
    /** git runner for repository resolution */
    runner?: CommandRunner;
    now?: () => Date;
    transport?: HttpTransport;
    createClient?: ClientFactory;
}

export function parseHookInput(raw: string): HookInput {
    if (!raw.trim()) {
        throw new HookInputError('No hook input on stdin');
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error: unknown) {
        throw new HookInputError(`Hook input is not JSON: ${errorMessage(error)}`, { cause: error });
    }

    const result = HookInputSchema.safeParse(json);
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join(', ');
        throw new HookInputError(`Unexpected hook input: ${issues}`);
    }
    return result.data;
}

/**
 * For best-effort flows: bad input is logged and treated as empty.
 */
export function parseHookInputLenient(raw: string, logger: Logger): HookInput {
    try {
        return parseHookInput(raw);
    } catch (error: unknown) {
        logger.warn(errorMessage(error));
        return {};
    }
}
