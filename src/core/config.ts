import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { FanoutConfigSchema, type FanoutConfig, type FanoutConfigInput } from './types.js';
import { ConfigError, toError } from './errors.js';

export const CONFIG_FILE_NAME = 'fanout.config.yaml';

export class ConfigManager {
  private config: FanoutConfig | null = null;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(projectDir?: string, env: NodeJS.ProcessEnv = process.env) {
    this.projectDir = projectDir || process.cwd();
    this.env = env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- project config <- env vars <- overrides
   */
  load(overrides?: FanoutConfigInput): FanoutConfig {
    let raw: Record<string, unknown> = {};

    // 1. Load project config
    const projectConfigPath = this.getConfigPath();
    if (existsSync(projectConfigPath)) {
      let parsed: unknown;
      try {
        parsed = parseYaml(readFileSync(projectConfigPath, 'utf-8'));
      } catch (err) {
        throw new ConfigError(`Failed to parse project config at ${projectConfigPath}`, toError(err));
      }
      if (isRecord(parsed)) {
        raw = deepMerge(raw, parsed);
      } else if (parsed !== null && parsed !== undefined) {
        throw new ConfigError(`Project config at ${projectConfigPath} must be a mapping`);
      }
    }

    // 2. Apply environment variables
    raw = this.applyEnvVars(raw);

    // 3. Apply overrides
    if (overrides) {
      raw = deepMerge(raw, { ...overrides });
    }

    // 4. Validate with Zod
    const result = FanoutConfigSchema.safeParse(raw);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${details}`, result.error);
    }

    this.config = result.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): FanoutConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getConfigPath(): string {
    return join(this.projectDir, CONFIG_FILE_NAME);
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const traversal: Record<string, unknown> = isRecord(raw.traversal) ? { ...raw.traversal } : {};
    const logging: Record<string, unknown> = isRecord(raw.logging) ? { ...raw.logging } : {};

    if (this.env.FANOUT_WORKERS) {
      // Left as NaN when unparseable so validation reports it
      traversal.workers = Number(this.env.FANOUT_WORKERS);
    }
    if (this.env.FANOUT_MODE) {
      traversal.mode = this.env.FANOUT_MODE;
    }
    if (this.env.FANOUT_LOG_LEVEL) {
      logging.level = this.env.FANOUT_LOG_LEVEL;
    }

    return { ...raw, traversal, logging };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];
    if (sourceValue === undefined) continue;
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }
  return result;
}
