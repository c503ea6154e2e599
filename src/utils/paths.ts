import path from 'path';
import fs from 'fs';
import os from 'os';

/**
 * Project root directory — walks up from __dirname to find package.json.
 * Works from any depth in dist/ after TypeScript compilation.
 */
export const PROJECT_ROOT: string = (() => {
  let dir = __dirname;
  while (dir !== path.dirname(dir)) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    dir = path.dirname(dir);
  }
  return process.cwd();
})();

/** Per-user Claude directory; logs and the prompt fallback file live under it. */
export const CLAUDE_HOME: string = path.join(os.homedir(), '.claude');

export const SCHEMA_PATH: string = path.join(PROJECT_ROOT, 'sql', 'schema.sql');

/**
 * Expand a leading `~` to the current user's home directory.
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') return os.homedir();
  if (filePath.startsWith('~/')) return path.join(os.homedir(), filePath.slice(2));
  return filePath;
}
