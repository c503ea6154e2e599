/**
 * Repository identity: the `origin` remote of a working directory,
 * normalized to host/owner/repo.
 */

import { execFileSync } from 'child_process';
import Logger from '../core/logger';
import { errorMessage } from '../core/errors';
import { expandHome } from '../utils/paths';

export type CommandRunner = (command: string, args: string[], options: { cwd: string; timeout: number }) => string;

export const GIT_TIMEOUT_MS = 5000;

const REMOTE_PROTOCOLS = new Set(['http:', 'https:', 'ssh:', 'git:', 'git+ssh:', 'ssh+git:']);

/** `git@github.com:acme/widgets.git` */
const SCP_LIKE = /^(?:[^@/\s]+@)?([^:/\s]+):(?!\/\/)(.+)$/;

/** Already normalized: `github.com/acme/widgets` */
const BARE_IDENTITY = /^([A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)+)\/(.+)$/;

export const runCommand: CommandRunner = (command, args, options) =>
    execFileSync(command, args, {
        cwd: options.cwd,
        timeout: options.timeout,
        encoding: 'utf8',
        stdio: ['ignore', 'pipe', 'ignore'],
    });

function cleanRepoPath(repoPath: string): string {
    return repoPath
        .replace(/^\/+|\/+$/g, '')
        .replace(/\.git$/, '')
        .replace(/\/+$/, '');
}

function join(host: string, repoPath: string): string | null {
    const cleaned = cleanRepoPath(repoPath);
    if (!host || !cleaned) return null;
    return `${host.toLowerCase()}/${cleaned}`;
}

/**
 * Normalize a remote URL to `host/path`. Scheme, credentials, port and a
 * trailing `.git` are dropped; nested groups are kept. Returns null for
 * local and `file://` remotes or anything without a host and path.
 */
export function normalizeRemoteUrl(url: string): string | null {
    const trimmed = url.trim();
    if (!trimmed) return null;

    if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) {
        let parsed: URL;
        try {
            parsed = new URL(trimmed);
        } catch {
            return null;
        }
        if (!REMOTE_PROTOCOLS.has(parsed.protocol)) return null;
        return join(parsed.hostname, parsed.pathname);
    }

    const scp = SCP_LIKE.exec(trimmed);
    if (scp) return join(scp[1], scp[2]);

    const bare = BARE_IDENTITY.exec(trimmed);
    if (bare) return join(bare[1], bare[2]);

    return null;
}

/**
 * Resolve the repository identity of `dir` (git walks up to the enclosing
 * repository). Null when there is no directory, no repository, no origin
 * remote, or the remote cannot be normalized.
 */
export function resolveRepository(
    dir: string | null,
    runner: CommandRunner = runCommand,
    logger: Logger = new Logger('repository')
): string | null {
    if (!dir) return null;

    let remote: string;
    try {
        remote = runner('git', ['remote', 'get-url', 'origin'], { cwd: expandHome(dir), timeout: GIT_TIMEOUT_MS });
    } catch (error: unknown) {
        logger.debug(`No origin remote for ${dir}: ${errorMessage(error)}`);
        return null;
    }

    const identity = normalizeRemoteUrl(remote);
    if (!identity) {
        logger.debug(`Unrecognized origin remote for ${dir}: ${remote.trim()}`);
    }
    return identity;
}
