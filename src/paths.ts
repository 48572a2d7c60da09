/**
 * XDG Base Directory compliant paths for trace-digest.
 *
 * - Config: ~/.config/trace-digest/ (or $XDG_CONFIG_HOME/trace-digest/)
 * - Project: .trace-digest/ in the working directory
 *
 * @see https://specifications.freedesktop.org/basedir-spec/basedir-spec-latest.html
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

const APP_DIR_NAME = 'trace-digest';

/**
 * Get the configuration directory path.
 * Uses $XDG_CONFIG_HOME if set, otherwise defaults to ~/.config/trace-digest/
 */
export function getConfigDir(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  return xdg ? join(xdg, APP_DIR_NAME) : join(homedir(), '.config', APP_DIR_NAME);
}

/**
 * Path of the user-level config file.
 */
export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

/**
 * Get the project-specific directory path (.trace-digest/ within cwd).
 */
export function getProjectDir(cwd: string = process.cwd()): string {
  return join(cwd, `.${APP_DIR_NAME}`);
}
