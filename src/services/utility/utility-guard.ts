/**
 * Utility existence guard
 *
 * Resolves command names against PATH and refuses to continue when a
 * required utility is absent.
 */

import * as fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import * as path from 'path';
import { MissingUtilityError } from '../../core/errors.js';
import { DEFAULT_SETTINGS, renderInstallHint } from '../config/config-service.js';

export type Environment = Record<string, string | undefined>;

export interface UtilityGuardOptions {
  env?: Environment;
  installHint?: string;
  platform?: NodeJS.Platform;
}

async function isExecutableFile(candidate: string, platform: NodeJS.Platform): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    if (!stat.isFile()) {
      return false;
    }
    if (platform !== 'win32') {
      await fs.access(candidate, fsConstants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
}

function readEnv(env: Environment, key: string): string | undefined {
  if (env[key] !== undefined) {
    return env[key];
  }
  // Windows keeps the original casing (Path, PathExt)
  const match = Object.keys(env).find(name => name.toUpperCase() === key);
  return match ? env[match] : undefined;
}

/**
 * Every path a shell would try for a command name, in lookup order.
 * Names containing a separator are tried as given; on Windows each
 * PATHEXT extension is appended after the bare name.
 */
export function searchCandidates(
  name: string,
  env: Environment = process.env,
  platform: NodeJS.Platform = process.platform
): string[] {
  const trimmed = name.trim();
  if (trimmed === '') {
    return [];
  }

  const pathApi = platform === 'win32' ? path.win32 : path.posix;
  const extensions = platform === 'win32'
    ? ['', ...(readEnv(env, 'PATHEXT') ?? '.COM;.EXE;.BAT;.CMD').split(';').filter(ext => ext !== '')]
    : [''];

  if (trimmed.includes('/') || (platform === 'win32' && trimmed.includes('\\'))) {
    return extensions.map(ext => pathApi.resolve(trimmed + ext));
  }

  const searchPath = readEnv(env, 'PATH') ?? '';
  const directories = searchPath.split(pathApi.delimiter).filter(dir => dir !== '');

  return directories.flatMap(dir => extensions.map(ext => pathApi.resolve(dir, trimmed + ext)));
}

/**
 * Resolve a command name the way a shell would
 *
 * @returns absolute path of the first match, or null when not found
 */
export async function resolveOnPath(
  name: string,
  env: Environment = process.env,
  platform: NodeJS.Platform = process.platform
): Promise<string | null> {
  for (const candidate of searchCandidates(name, env, platform)) {
    if (await isExecutableFile(candidate, platform)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Anything that can refuse to proceed without a utility
 */
export interface UtilityRequirement {
  require(utility: string): Promise<void>;
}

/**
 * Utility Guard
 */
export class UtilityGuard implements UtilityRequirement {
  private env: Environment;
  private installHint: string;
  private platform: NodeJS.Platform;

  constructor(options: UtilityGuardOptions = {}) {
    this.env = options.env ?? process.env;
    this.installHint = options.installHint ?? DEFAULT_SETTINGS.installHint;
    this.platform = options.platform ?? process.platform;
  }

  async isInstalled(utility: string): Promise<boolean> {
    return (await resolveOnPath(utility, this.env, this.platform)) !== null;
  }

  /**
   * Succeeds silently when the utility resolves
   *
   * @throws MissingUtilityError otherwise
   */
  async require(utility: string): Promise<void> {
    if (!await this.isInstalled(utility)) {
      throw new MissingUtilityError(utility, renderInstallHint(this.installHint, utility));
    }
  }
}
