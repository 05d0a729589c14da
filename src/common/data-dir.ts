/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Location of the per-user data directory holding recently-used.xbel.
*/

import * as os from 'os';
import * as path from 'path';

export const MANIFEST_NAME = 'recently-used.xbel';

/**
 * Per-user data directory.
 * Linux/BSD: $XDG_DATA_HOME (when absolute) or ~/.local/share.
 * macOS: ~/Library/Application Support. Windows: %APPDATA%.
 */
export function userDataDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir()
): string {
  if (platform === 'win32') {
    if (env.APPDATA) return env.APPDATA;
    if (!home) throw new Error('Unable to determine the user data directory: no home directory');
    return path.win32.join(home, 'AppData', 'Roaming');
  }

  if (!home) throw new Error('Unable to determine the user data directory: no home directory');
  if (platform === 'darwin') return path.posix.join(home, 'Library', 'Application Support');

  const xdg = env.XDG_DATA_HOME;
  if (xdg && path.posix.isAbsolute(xdg)) return xdg;
  return path.posix.join(home, '.local', 'share');
}

export function recentlyUsedManifest(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir()
): string {
  const dir = userDataDir(platform, env, home);
  return platform === 'win32' ? path.win32.join(dir, MANIFEST_NAME) : path.posix.join(dir, MANIFEST_NAME);
}
