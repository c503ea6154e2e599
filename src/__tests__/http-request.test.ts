import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import http from 'http';
import { postJSON } from '../utils/http-request';

function portOf(server: http.Server): number {
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server is not listening on TCP');
    return address.port;
}

interface Received {
    method: string | undefined;
    contentType: string | undefined;
    authorization: string | undefined;
    body: unknown;
}

describe('postJSON', () => {
    let server: http.Server;
    let baseUrl: string;

    beforeAll(async () => {
        server = http.createServer((req, res) => {
            const chunks: Buffer[] = [];
            req.on('data', (chunk: Buffer) => { chunks.push(chunk); });
            req.on('end', () => {
                if (req.url === '/echo') {
                    const received: Received = {
                        method: req.method,
                        contentType: req.headers['content-type'],
                        authorization: req.headers.authorization,
                        body: JSON.parse(Buffer.concat(chunks).toString('utf8')),
                    };
                    res.writeHead(200, { 'Content-Type': 'application/json' });
                    res.end(JSON.stringify({ ok: true, received }));
                } else if (req.url === '/broken') {
                    res.writeHead(502, { 'Content-Type': 'text/plain' });
                    res.end('Bad Gateway');
                } else if (req.url === '/empty') {
                    res.writeHead(204);
                    res.end();
                }
                // any other path never answers
            });
        });
        await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
        baseUrl = `http://127.0.0.1:${portOf(server)}`;
    });

    afterAll(async () => {
        server.closeAllConnections();
        await new Promise<void>(resolve => server.close(() => resolve()));
    });

    it('posts a JSON body with extra headers and parses the JSON reply', async () => {
        const response = await postJSON(`${baseUrl}/echo`, { chat_id: '42', text: 'hi' }, {
            headers: { Authorization: 'Bearer test-secret' },
        });

        expect(response).toEqual({
            status: 200,
            data: {
                ok: true,
                received: {
                    method: 'POST',
                    contentType: 'application/json',
                    authorization: 'Bearer test-secret',
                    body: { chat_id: '42', text: 'hi' },
                },
            },
        });
    });

    it('resolves non-2xx replies and keeps a non-JSON body as text', async () => {
        await expect(postJSON(`${baseUrl}/broken`, {})).resolves.toEqual({ status: 502, data: 'Bad Gateway' });
    });

    it('reports an empty body as null', async () => {
        await expect(postJSON(`${baseUrl}/empty`, {})).resolves.toEqual({ status: 204, data: null });
    });

    it('rejects after the timeout without naming the path', async () => {
        const error = await postJSON(`${baseUrl}/bottest-token/sendMessage`, {}, { timeout: 100 }).then(
            () => null,
            (reason: unknown) => reason
        );

        expect(error).toBeInstanceOf(Error);
        expect(error instanceof Error ? error.message : '').toBe(`POST to ${new URL(baseUrl).host} timed out after 100ms`);
    });

    it('rejects when nothing listens', async () => {
        const closed = http.createServer();
        await new Promise<void>(resolve => closed.listen(0, '127.0.0.1', resolve));
        const port = portOf(closed);
        await new Promise<void>(resolve => closed.close(() => resolve()));

        await expect(postJSON(`http://127.0.0.1:${port}/echo`, {})).rejects.toThrow(/ECONNREFUSED/);
    });
});
