/**
 * Drain hook input from stdin.
 *
 * The runtime does not always close stdin, so reading stops after
 * `timeoutMs` and whatever arrived so far is returned.
 */
export const STDIN_TIMEOUT_MS = 500;

export function readStdin(timeoutMs: number = STDIN_TIMEOUT_MS): Promise<string> {
  return new Promise((resolve) => {
    if (process.stdin.isTTY) {
      resolve('');
      return;
    }

    let data = '';
    let resolved = false;
    process.stdin.setEncoding('utf8');
    process.stdin.on('data', (chunk: string) => { data += chunk; });
    process.stdin.on('end', () => {
      if (!resolved) { resolved = true; resolve(data); }
    });

    setTimeout(() => {
      if (!resolved) {
        resolved = true;
        process.stdin.destroy();
        resolve(data);
      }
    }, timeoutMs).unref();
  });
}
