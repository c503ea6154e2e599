/**
 * Hook Configuration
 * Builds the one configuration value a hook run is given. Nothing below
 * this module reads process.env for settings.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import dotenv from 'dotenv';
import { CLAUDE_HOME, PROJECT_ROOT } from '../utils/paths';
import type { DatabaseSettings, HookConfig, TelegramSettings } from '../types';

type Env = Record<string, string | undefined>;

export const DEFAULT_FALLBACK_FILE = path.join(CLAUDE_HOME, 'data', 'user_prompts.yaml');
export const DEFAULT_LOG_DIR = path.join(CLAUDE_HOME, 'logs');
export const FALLBACK_LOG_DIR = path.join(os.tmpdir(), 'claude-hooks', 'logs');
export const DEFAULT_TIMEOUT_MS = 10000;
export const LOG_RETENTION_DAYS = 7;

/**
 * Load `.env` from the project root into process.env. Variables already
 * set in the environment win. Returns false when there is no .env file.
 */
export function loadEnvFile(envPath: string = path.join(PROJECT_ROOT, '.env')): boolean {
    if (!fs.existsSync(envPath)) return false;
    dotenv.config({ path: envPath, quiet: true });
    return true;
}

function readVar(env: Env, name: string): string | null {
    const value = env[name]?.trim();
    return value ? value : null;
}

function readTimeout(env: Env, name: string): number {
    const value = Number.parseInt(env[name] ?? '', 10);
    return Number.isFinite(value) && value > 0 ? value : DEFAULT_TIMEOUT_MS;
}

export function loadConfig(env: Env = process.env): HookConfig {
    const telegram: TelegramSettings = {
        botToken: readVar(env, 'TELEGRAM_BOT_TOKEN'),
        chatId: readVar(env, 'TELEGRAM_CHAT_ID'),
        forceIPv4: env.TELEGRAM_FORCE_IPV4 === 'true',
    };

    const database: DatabaseSettings = {
        dsn: readVar(env, 'CLAUDE_POSTGRES_SERVER_DSN'),
        hostPort: readVar(env, 'CLAUDE_POSTGRES_SERVER_HOST_PORT'),
        user: readVar(env, 'CLAUDE_POSTGRES_SERVER_USER'),
        password: readVar(env, 'CLAUDE_POSTGRES_SERVER_PASS'),
        database: readVar(env, 'CLAUDE_POSTGRES_SERVER_DB_NAME'),
    };

    return Object.freeze({
        telegram: Object.freeze(telegram),
        database: Object.freeze(database),
        projectDir: readVar(env, 'CLAUDE_PROJECT_DIR'),
        sessionId: readVar(env, 'CLAUDE_SESSION_ID'),
        fallbackFile: readVar(env, 'CLAUDE_USER_PROMPTS_FILE') ?? DEFAULT_FALLBACK_FILE,
        timeouts: Object.freeze({
            httpMs: readTimeout(env, 'HOOK_HTTP_TIMEOUT_MS'),
            dbMs: readTimeout(env, 'HOOK_DB_TIMEOUT_MS'),
        }),
        logging: Object.freeze({
            dir: readVar(env, 'HOOK_LOG_DIR') ?? DEFAULT_LOG_DIR,
            fallbackDir: FALLBACK_LOG_DIR,
            retention: LOG_RETENTION_DAYS,
        }),
    });
}

/**
 * Names of the Telegram variables that are not set.
 */
export function missingTelegramSettings(config: HookConfig): string[] {
    const missing: string[] = [];
    if (!config.telegram.botToken) missing.push('TELEGRAM_BOT_TOKEN');
    if (!config.telegram.chatId) missing.push('TELEGRAM_CHAT_ID');
    return missing;
}
