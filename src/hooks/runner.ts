/**
 * Process wrapper shared by the hook scripts: load configuration, read
 * stdin, run one flow, exit with its code. Any exception that escapes a
 * flow is logged and becomes exit code 1.
 */

import Logger from '../core/logger';
import { loadConfig, loadEnvFile } from '../core/config';
import { errorMessage } from '../core/errors';
import { readStdin } from '../utils/stdin';
import type { HookDeps } from './input';
import { EXIT_FAILURE, type ExitCode, type HookConfig } from '../types';

export type HookFlow = (rawInput: string, config: HookConfig, deps?: HookDeps) => Promise<ExitCode>;

export async function runHook(name: string, flow: HookFlow): Promise<never> {
    const logger = new Logger(`hook:${name}`);
    let code: ExitCode = EXIT_FAILURE;

    try {
        loadEnvFile();
        const config = loadConfig();
        Logger.configure(config.logging);

        logger.debug('Hook started from:', process.cwd());
        const raw = await readStdin();
        code = await flow(raw, config, { logger });
    } catch (error: unknown) {
        logger.error(`Unexpected failure: ${errorMessage(error)}`);
        code = EXIT_FAILURE;
    }

    logger.debug(`Exiting with code ${code}`);
    process.exit(code);
}
