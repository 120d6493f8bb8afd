/**
 * Platform-specific utilities.
 *
 * Path expansion, default locations and executable lookup that work on
 * Linux, macOS, Android shells (Termux) and Windows.
 *
 * @module utils/platform
 */

import { constants as fsConstants, promises as fs } from 'fs';
import { platform, homedir } from 'os';
import { delimiter, isAbsolute, join, resolve } from 'path';

/** Current platform is Windows */
export const isWindows = platform() === 'win32';

/**
 * Expands a path that may contain ~ to the user's home directory.
 *
 * @param path - Path that may start with ~/ or ~
 * @returns Expanded absolute path
 */
export function expandPath(path: string): string {
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  if (path === '~') {
    return homedir();
  }
  return path;
}

/**
 * Gets the default download directory (~/Downloads).
 */
export function getDefaultDownloadDir(): string {
  return join(homedir(), 'Downloads');
}

/**
 * Candidate file names for an executable on this platform.
 */
function executableNames(name: string, env: NodeJS.ProcessEnv): string[] {
  if (!isWindows) {
    return [name];
  }
  const extensions = (env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean);
  return [name, ...extensions.map((ext) => name + ext.toLowerCase())];
}

async function isExecutableFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) {
      return false;
    }
    await fs.access(filePath, isWindows ? fsConstants.F_OK : fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolves an executable the way a shell would.
 *
 * A name containing a path separator is checked as given; a bare name is
 * searched for in each PATH entry.
 *
 * @param name - Executable name or path
 * @param env - Environment providing PATH (defaults to process.env)
 * @returns Absolute path of the executable, or null if not found
 */
export async function findExecutable(
  name: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<string | null> {
  if (name.includes('/') || name.includes('\\') || isAbsolute(name)) {
    const candidate = resolve(expandPath(name));
    return (await isExecutableFile(candidate)) ? candidate : null;
  }

  const searchPath = env.PATH ?? env.Path ?? '';
  for (const dir of searchPath.split(delimiter)) {
    if (!dir) {
      continue;
    }
    for (const candidateName of executableNames(name, env)) {
      const candidate = join(dir, candidateName);
      if (await isExecutableFile(candidate)) {
        return candidate;
      }
    }
  }

  return null;
}
