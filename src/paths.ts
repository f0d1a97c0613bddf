/**
 * XDG Base Directory compliant paths for chart-reflect.
 *
 * - Config: ~/.config/chart-reflect/ (or $XDG_CONFIG_HOME/chart-reflect/)
 * - Project: .chart-reflect/ in the working directory
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

const APP_DIR = 'chart-reflect';

/**
 * User configuration directory. Uses $XDG_CONFIG_HOME if set.
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdg = env.XDG_CONFIG_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.config', APP_DIR);
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getConfigDir(env), 'config.json');
}

/**
 * Project-specific directory: always `.chart-reflect/` under `cwd`.
 */
export function getProjectDir(cwd: string = process.cwd()): string {
  return join(cwd, `.${APP_DIR}`);
}
