import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import {
  CliffKnapsackConfigSchema,
  type CliffKnapsackConfig,
  type CliffKnapsackConfigInput,
} from './types.js';
import { ConfigError } from './errors.js';

export const PROJECT_CONFIG_FILE = '.cliff-knapsack.yaml';
export const GLOBAL_CONFIG_FILE = 'config.yaml';

export interface ConfigManagerOptions {
  projectDir?: string;
  globalDir?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: CliffKnapsackConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.cliff-knapsack');
    this.projectDir = options.projectDir ?? process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: CliffKnapsackConfigInput): CliffKnapsackConfig {
    let raw: Record<string, unknown> = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, GLOBAL_CONFIG_FILE), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, PROJECT_CONFIG_FILE), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, { ...overrides });
    }

    const result = CliffKnapsackConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(`Invalid configuration: ${result.error.message}`, result.error);
    }

    this.config = result.data;
    return this.config;
  }

  get(): CliffKnapsackConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  private readYaml(path: string, label: string): Record<string, unknown> {
    if (!existsSync(path)) {
      return {};
    }
    try {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      return isPlainObject(parsed) ? parsed : {};
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const result = { ...raw };

    const instancePath = this.env.CLIFF_KNAPSACK_INSTANCE;
    if (instancePath) {
      result.instance = { ...sectionOf(result, 'instance'), path: instancePath };
    }

    const strictLength = this.env.CLIFF_KNAPSACK_STRICT_LENGTH;
    if (strictLength) {
      result.scoring = {
        ...sectionOf(result, 'scoring'),
        strictLength: strictLength === '1' || strictLength.toLowerCase() === 'true',
      };
    }

    const level = this.env.CLIFF_KNAPSACK_LOG_LEVEL;
    if (level) {
      result.logging = { ...sectionOf(result, 'logging'), level };
    }

    return result;
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const existing = target[key];
      if (incoming === undefined) continue;
      if (isPlainObject(incoming) && isPlainObject(existing)) {
        result[key] = this.deepMerge(existing, incoming);
      } else {
        result[key] = incoming;
      }
    }
    return result;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sectionOf(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const section = raw[key];
  return isPlainObject(section) ? section : {};
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
