import { describe, it, expect, vi } from 'vitest';
import TelegramChannel, { MAX_BODY_LENGTH, formatTelegramMessage, truncate } from '../channels/telegram/telegram';
import { ConfigError, SinkError } from '../core/errors';
import type { HttpOptions, HttpResponse } from '../utils/http-request';
import { makeRecord } from './helpers';

const SEND_URL = 'https://api.telegram.org/bottest-token/sendMessage';

function okTransport() {
    return vi.fn(async (_url: string, _body: unknown, _opts?: HttpOptions): Promise<HttpResponse> => ({
        status: 200,
        data: { ok: true, result: { message_id: 1 } },
    }));
}

function makeChannel(transport = okTransport(), forceIPv4 = false) {
    const channel = new TelegramChannel(
        { botToken: 'test-token', chatId: '42', forceIPv4, timeoutMs: 3000 },
        transport
    );
    return { channel, transport };
}

describe('formatTelegramMessage', () => {
    it('lays out header, body and metadata', () => {
        expect(formatTelegramMessage(makeRecord())).toBe([
            '✅ *Claude finished*',
            '',
            'World',
            '',
            '*Time:* `2024-05-01T12:00:00.000Z`',
            '*Project:* `/work/widgets`',
            '*Repository:* `github.com/acme/widgets`',
            '*Session:* `sess-1`',
        ].join('\n'));
    });

    it('uses the waiting header for Notification events and omits unknown metadata', () => {
        const record = makeRecord({ eventName: 'Notification', cwd: null, repository: null, sessionId: null });

        expect(formatTelegramMessage(record)).toBe(
            '⏳ *Claude is waiting for input*\n\nWorld\n\n*Time:* `2024-05-01T12:00:00.000Z`'
        );
    });

    it('keeps backticks out of code spans', () => {
        const record = makeRecord({ cwd: '/work/`odd`', repository: null, sessionId: null });

        expect(formatTelegramMessage(record).split('\n').pop()).toBe("*Project:* `/work/'odd'`");
    });
});

describe('truncate', () => {
    it('caps the body with an ellipsis', () => {
        const result = truncate('a'.repeat(MAX_BODY_LENGTH + 500));

        expect(result).toHaveLength(MAX_BODY_LENGTH);
        expect(result.endsWith('a...')).toBe(true);
    });

    it('does not split a surrogate pair at the cut', () => {
        const text = 'a'.repeat(MAX_BODY_LENGTH - 4) + '\u{1F600}' + 'b'.repeat(100);

        expect(truncate(text)).toBe('a'.repeat(MAX_BODY_LENGTH - 4) + '...');
    });

    it('keeps a surrogate pair that fits before the cut', () => {
        const text = 'a'.repeat(MAX_BODY_LENGTH - 5) + '\u{1F600}' + 'b'.repeat(100);

        expect(truncate(text)).toBe('a'.repeat(MAX_BODY_LENGTH - 5) + '\u{1F600}...');
    });

    it('leaves short text alone', () => {
        expect(truncate('short')).toBe('short');
    });
});

describe('TelegramChannel', () => {
    it('requires a token and a chat id', () => {
        expect(() => new TelegramChannel({ botToken: '', chatId: '42' })).toThrow(ConfigError);
    });

    it('posts one Markdown message', async () => {
        const { channel, transport } = makeChannel(okTransport(), true);

        await channel.send('*hi*');

        expect(transport).toHaveBeenCalledTimes(1);
        expect(transport).toHaveBeenCalledWith(
            SEND_URL,
            { chat_id: '42', text: '*hi*', parse_mode: 'Markdown', disable_web_page_preview: true },
            { timeout: 3000, family: 4 }
        );
    });

    it('resends as plain text when Telegram cannot parse the Markdown', async () => {
        const transport = okTransport();
        transport.mockResolvedValueOnce({
            status: 400,
            data: { ok: false, description: "Bad Request: can't parse entities: Can't find end of the entity" },
        });
        const { channel } = makeChannel(transport);

        await channel.send('an_unbalanced *marker');

        expect(transport).toHaveBeenCalledTimes(2);
        expect(transport.mock.calls[1][1]).toEqual({
            chat_id: '42',
            text: 'an_unbalanced *marker',
            disable_web_page_preview: true,
        });
    });

    it('fails on other API errors without resending', async () => {
        const transport = okTransport();
        transport.mockResolvedValueOnce({ status: 401, data: { ok: false, description: 'Unauthorized' } });
        const { channel } = makeChannel(transport);

        await expect(channel.send('hi')).rejects.toThrow('Telegram API 401: Unauthorized');
        expect(transport).toHaveBeenCalledTimes(1);
    });

    it('treats ok: false as a failure even with status 200', async () => {
        const transport = okTransport();
        transport.mockResolvedValueOnce({ status: 200, data: { ok: false } });
        const { channel } = makeChannel(transport);

        await expect(channel.send('hi')).rejects.toBeInstanceOf(SinkError);
    });

    it('wraps transport errors from write in a SinkError', async () => {
        const transport = okTransport();
        transport.mockRejectedValueOnce(new Error('socket hang up'));
        const { channel } = makeChannel(transport);

        await expect(channel.write(makeRecord())).rejects.toThrow('telegram write failed: socket hang up');
    });
});
