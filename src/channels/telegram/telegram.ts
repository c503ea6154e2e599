/**
 * Telegram Channel
 * Sends the last assistant message to a chat via the Telegram Bot API.
 */

import RecordChannel from '../base/channel';
import { ConfigError, SinkError } from '../../core/errors';
import { postJSON, type HttpOptions, type HttpResponse, type HttpTransport } from '../../utils/http-request';
import { isRecord } from '../../utils/guards';
import type { OutputRecord } from '../../types';

export const TELEGRAM_API_BASE = 'https://api.telegram.org';
export const MAX_BODY_LENGTH = 3500;

interface TelegramChannelConfig {
    botToken: string;
    chatId: string;
    forceIPv4?: boolean;
    timeoutMs?: number;
}

interface SendMessagePayload {
    chat_id: string;
    text: string;
    parse_mode?: 'Markdown';
    disable_web_page_preview: boolean;
}

/** Legacy Markdown has no escape inside code spans; swap backticks out. */
function codeSpan(value: string): string {
    return '`' + value.replace(/`/g, "'") + '`';
}

/**
 * Cap `text` at `max` UTF-16 units, cutting on a code point boundary so a
 * surrogate pair is never split.
 */
export function truncate(text: string, max: number = MAX_BODY_LENGTH): string {
    if (text.length <= max) return text;
    let kept = '';
    for (const char of text) {
        if (kept.length + char.length > max - 3) break;
        kept += char;
    }
    return kept + '...';
}

export function formatTelegramMessage(record: OutputRecord): string {
    const waiting = record.eventName === 'Notification';
    const header = waiting ? '\u23f3 *Claude is waiting for input*' : '\u2705 *Claude finished*';

    const lines = [header, '', truncate(record.text), '', `*Time:* ${codeSpan(record.createdAt)}`];
    if (record.cwd) lines.push(`*Project:* ${codeSpan(record.cwd)}`);
    if (record.repository) lines.push(`*Repository:* ${codeSpan(record.repository)}`);
    if (record.sessionId) lines.push(`*Session:* ${codeSpan(record.sessionId)}`);

    return lines.join('\n');
}

function describeFailure(response: HttpResponse): string {
    const description = isRecord(response.data) && typeof response.data.description === 'string'
        ? response.data.description
        : 'no description';
    return `Telegram API ${response.status}: ${description}`;
}

function isMarkdownRejection(response: HttpResponse): boolean {
    return response.status === 400 && /can't parse entities/i.test(describeFailure(response));
}

function isSuccess(response: HttpResponse): boolean {
    const ok = isRecord(response.data) ? response.data.ok !== false : true;
    return response.status >= 200 && response.status < 300 && ok;
}

class TelegramChannel extends RecordChannel {
    config: TelegramChannelConfig;
    transport: HttpTransport;
    apiBaseUrl: string;

    constructor(config: TelegramChannelConfig, transport: HttpTransport = postJSON) {
        super('telegram');
        if (!config.botToken || !config.chatId) {
            throw new ConfigError('Telegram bot token and chat id are required');
        }
        this.config = config;
        this.transport = transport;
        this.apiBaseUrl = TELEGRAM_API_BASE;
    }

    /**
     * Generate network options for HTTP requests
     */
    _getNetworkOptions(): HttpOptions {
        const options: HttpOptions = { timeout: this.config.timeoutMs };
        if (this.config.forceIPv4) {
            options.family = 4;
        }
        return options;
    }

    async _writeImpl(record: OutputRecord): Promise<void> {
        await this.send(formatTelegramMessage(record));
    }

    /**
     * One sendMessage call. If Telegram cannot parse the Markdown, the same
     * text goes out once more without parse_mode.
     */
    async send(text: string): Promise<void> {
        const response = await this._post({
            chat_id: this.config.chatId,
            text,
            parse_mode: 'Markdown',
            disable_web_page_preview: true,
        });
        if (isSuccess(response)) return;

        if (!isMarkdownRejection(response)) {
            throw new SinkError(describeFailure(response));
        }

        this.logger.warn('Telegram rejected Markdown, resending as plain text');
        const plain = await this._post({
            chat_id: this.config.chatId,
            text,
            disable_web_page_preview: true,
        });
        if (!isSuccess(plain)) {
            throw new SinkError(describeFailure(plain));
        }
    }

    async _post(payload: SendMessagePayload): Promise<HttpResponse> {
        return this.transport(
            `${this.apiBaseUrl}/bot${this.config.botToken}/sendMessage`,
            payload,
            this._getNetworkOptions()
        );
    }
}

export default TelegramChannel;
