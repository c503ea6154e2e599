/**
 * JSON POST over Node's http/https, the one request shape the Telegram
 * channel makes.
 */

import http from 'http';
import https from 'https';

export interface HttpOptions {
  headers?: Record<string, string>;
  family?: 4 | 6;
  /** Milliseconds of socket inactivity before the request is aborted */
  timeout?: number;
}

export interface HttpResponse {
  status: number;
  /** Parsed JSON, the raw text when the body is not JSON, or null when empty */
  data: unknown;
}

/** A POST function; injectable so tests never reach the network. */
export type HttpTransport = (url: string, body: unknown, opts?: HttpOptions) => Promise<HttpResponse>;

export const DEFAULT_HTTP_TIMEOUT_MS = 10000;

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function open(
  target: URL,
  options: http.RequestOptions,
  onResponse: (res: http.IncomingMessage) => void
): http.ClientRequest {
  return target.protocol === 'http:'
    ? http.request(target, options, onResponse)
    : https.request(target, options, onResponse);
}

/**
 * Resolves with the status and body for every HTTP status; rejects on
 * network errors and on timeout. Error messages name the host only, since
 * the path may carry a token.
 */
export const postJSON: HttpTransport = (url, body, opts = {}) =>
  new Promise((resolve, reject) => {
    const target = new URL(url);
    const payload = JSON.stringify(body);
    const timeout = opts.timeout ?? DEFAULT_HTTP_TIMEOUT_MS;

    const req = open(target, {
      method: 'POST',
      family: opts.family,
      timeout,
      headers: {
        ...opts.headers,
        'Content-Type': 'application/json',
        'Content-Length': Buffer.byteLength(payload),
      },
    }, (res) => {
      const chunks: Buffer[] = [];
      res.on('data', (chunk: Buffer) => { chunks.push(chunk); });
      res.on('error', reject);
      res.on('end', () => {
        resolve({ status: res.statusCode ?? 0, data: parseBody(Buffer.concat(chunks).toString('utf8')) });
      });
    });

    req.on('timeout', () => {
      req.destroy(new Error(`POST to ${target.host} timed out after ${timeout}ms`));
    });
    req.on('error', reject);
    req.end(payload);
  });
