/**
 * Cross-platform path utilities for mdquery
 *
 * Resolves where the index store and user configuration live.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Application name used for directory naming
 */
export const APP_NAME = 'mdquery';

/**
 * Get the mdquery data directory
 *
 * - macOS/Linux: $XDG_DATA_HOME/mdquery if set, otherwise ~/.mdquery
 * - Windows: %LOCALAPPDATA%\mdquery
 */
export function getDataDir(): string {
  if (process.platform === 'win32') {
    const localAppData = process.env.LOCALAPPDATA;
    if (localAppData) {
      return join(localAppData, APP_NAME);
    }
    return join(homedir(), 'AppData', 'Local', APP_NAME);
  }

  const xdgDataHome = process.env.XDG_DATA_HOME;
  if (xdgDataHome) {
    return join(xdgDataHome, APP_NAME);
  }
  return join(homedir(), `.${APP_NAME}`);
}

/**
 * Default location of the index store
 */
export function getDefaultDatabasePath(): string {
  return join(getDataDir(), 'index.db');
}

/**
 * Get the user configuration directory
 *
 * - macOS/Linux: $XDG_CONFIG_HOME/mdquery or ~/.config/mdquery
 * - Windows: %APPDATA%\mdquery
 */
export function getConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA;
    if (appData) {
      return join(appData, APP_NAME);
    }
    return join(homedir(), 'AppData', 'Roaming', APP_NAME);
  }

  const xdgConfigHome = process.env.XDG_CONFIG_HOME;
  if (xdgConfigHome) {
    return join(xdgConfigHome, APP_NAME);
  }
  return join(homedir(), '.config', APP_NAME);
}
