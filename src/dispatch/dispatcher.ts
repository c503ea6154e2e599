/**
 * Sink Dispatcher
 * Delivers one record according to a policy. Never throws.
 */

import Logger from '../core/logger';
import { errorMessage } from '../core/errors';
import type { SinkPolicy } from './policy';
import type { OutputRecord } from '../types';

export interface RecordSink {
    readonly name: string;
    write(record: OutputRecord): Promise<void>;
}

export interface SinkSet {
    /** null when the primary sink is not configured */
    primary: RecordSink | null;
    fallback?: RecordSink | null;
}

export type DispatchOutcome =
    | { status: 'delivered'; sink: string }
    | { status: 'fallback'; sink: string; reason: string }
    | { status: 'skipped'; reason: string }
    | { status: 'failed'; reason: string };

const defaultLogger = new Logger('dispatch');

async function writeFallback(
    record: OutputRecord,
    fallback: RecordSink | null | undefined,
    reason: string,
    logger: Logger
): Promise<DispatchOutcome> {
    if (!fallback) {
        logger.error(`No fallback sink configured (${reason})`);
        return { status: 'failed', reason };
    }

    logger.info(`Falling back to ${fallback.name}: ${reason}`);
    try {
        await fallback.write(record);
        return { status: 'fallback', sink: fallback.name, reason };
    } catch (error: unknown) {
        const message = errorMessage(error);
        logger.error(`Fallback ${fallback.name} failed: ${message}`);
        return { status: 'failed', reason: `${reason}; fallback failed: ${message}` };
    }
}

export async function dispatch(
    record: OutputRecord,
    policy: SinkPolicy,
    sinks: SinkSet,
    logger: Logger = defaultLogger
): Promise<DispatchOutcome> {
    const { primary } = sinks;

    if (!primary) {
        if (policy.kind === 'notify-only') {
            logger.warn('Notification sink not configured, skipping delivery');
            return { status: 'skipped', reason: 'not configured' };
        }
        if (policy.onMissingConfig === 'fallback') {
            return writeFallback(record, sinks.fallback, 'primary sink not configured', logger);
        }
        logger.error('Missing database configuration');
        return { status: 'failed', reason: 'missing database configuration' };
    }

    try {
        await primary.write(record);
        return { status: 'delivered', sink: primary.name };
    } catch (error: unknown) {
        const reason = errorMessage(error);
        if (policy.kind === 'persist' && policy.onPrimaryFailure === 'fallback') {
            return writeFallback(record, sinks.fallback, reason, logger);
        }
        logger.error(`${primary.name} delivery failed: ${reason}`);
        return { status: 'failed', reason };
    }
}
