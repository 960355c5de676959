/**
 * Configuration Service
 *
 * Loads and provides access to hooktask settings from .hooktask.yaml.
 * A missing or empty file yields the defaults below.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { ConfigError } from '../../core/errors.js';
import { HookTaskConfigSchema, type HookTaskConfig, type HookType } from '../../core/schemas.js';

export const DEFAULT_CONFIG_FILE = '.hooktask.yaml';

/**
 * Fully resolved settings, defaults applied
 */
export interface HookTaskSettings {
  hookManager: string;
  hookTypes: HookType[];
  installHint: string;
  helpColumnWidth: number;
}

export const DEFAULT_SETTINGS: Readonly<HookTaskSettings> = Object.freeze<HookTaskSettings>({
  hookManager: 'pre-commit',
  hookTypes: ['pre-commit', 'commit-msg'],
  installHint: 'uv tool install {utility}',
  helpColumnWidth: 25
});

/**
 * Substitute the utility name into an install hint template
 */
export function renderInstallHint(template: string, utility: string): string {
  return template.split('{utility}').join(utility);
}

/**
 * Configuration Service
 */
export class ConfigService {
  private configPath: string;
  private cachedConfig: HookTaskConfig | null = null;

  constructor(options: { configPath?: string; cwd?: string } = {}) {
    const cwd = options.cwd || process.cwd();
    this.configPath = path.resolve(cwd, options.configPath || DEFAULT_CONFIG_FILE);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load and validate configuration from file, with caching
   *
   * @throws ConfigError if the file is unreadable, not YAML, or fails validation
   */
  private async loadConfig(): Promise<HookTaskConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === 'ENOENT') {
        this.cachedConfig = {};
        return this.cachedConfig;
      }
      throw new ConfigError(`Cannot read ${this.configPath}: ${err.message}`, undefined, { path: this.configPath });
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      throw new ConfigError(
        `Invalid YAML in ${this.configPath}: ${(error as Error).message}`,
        undefined,
        { path: this.configPath }
      );
    }

    const result = HookTaskConfigSchema.safeParse(parsed ?? {});
    if (!result.success) {
      const issue = result.error.issues[0];
      // Unknown keys are reported on the enclosing object, so name the key itself
      const fieldPath = issue.code === 'unrecognized_keys' ? [...issue.path, issue.keys[0]] : issue.path;
      const field = fieldPath.join('.') || undefined;
      const where = field ? ` (${field})` : '';
      throw new ConfigError(`Invalid configuration in ${this.configPath}${where}: ${issue.message}`, field);
    }

    this.cachedConfig = result.data;
    return this.cachedConfig;
  }

  /**
   * Clear the cached configuration
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  /**
   * Get settings with defaults filled in
   */
  async getSettings(): Promise<HookTaskSettings> {
    const config = await this.loadConfig();

    return {
      hookManager: config.hookManager ?? DEFAULT_SETTINGS.hookManager,
      hookTypes: config.hookTypes ? [...config.hookTypes] : [...DEFAULT_SETTINGS.hookTypes],
      installHint: config.installHint ?? DEFAULT_SETTINGS.installHint,
      helpColumnWidth: config.helpColumnWidth ?? DEFAULT_SETTINGS.helpColumnWidth
    };
  }
}
