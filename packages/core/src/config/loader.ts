import fs from 'fs';
import dotenv from 'dotenv';
import yaml from 'js-yaml';
import type { z } from 'zod';
import { ConfigError, ConfigSchema } from '@diffwatch/shared';
import type { Config, ConfigInput } from '@diffwatch/shared';

type ConfigTree = Record<string, unknown>;

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

/** Overrides taken from CLI flags; highest precedence */
export type ConfigFlags = DeepPartial<ConfigInput>;

export interface ConfigOptions {
  /** YAML file given with --config */
  configPath?: string;
  flags?: ConfigFlags;
  env?: NodeJS.ProcessEnv;
  /** dotenv file read beneath `env`; a missing file is ignored */
  envFile?: string;
}

/**
 * Environment variable to config path. Later entries win, so the legacy
 * `PROJECT_DESCRPTION` spelling only applies when the correct one is unset.
 */
export const ENV_BINDINGS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['REPO_URL', ['repository', 'url']],
  ['PERSONAL_TOKEN', ['repository', 'token']],
  ['REPO_BRANCH', ['repository', 'branch']],
  ['REPOS_DIR', ['repository', 'mirrorDir']],
  ['GIT_TIMEOUT_MS', ['git', 'timeoutMs']],
  ['DB_FILE', ['checkpoint', 'dbPath']],
  ['SCAN_LOOKBACK_DAYS', ['checkpoint', 'lookbackDays']],
  ['BASE_LLM_API', ['analysis', 'baseUrl']],
  ['PROMPT_LLM_API_ENDPOINT', ['analysis', 'endpoint']],
  ['LLM_API_KEY', ['analysis', 'apiKey']],
  ['LLM_MODEL', ['analysis', 'model']],
  ['LLM_TIMEOUT_MS', ['analysis', 'timeoutMs']],
  ['PROJECT_DESCRPTION', ['project', 'description']],
  ['PROJECT_DESCRIPTION', ['project', 'description']],
  ['SMTP_SERVER', ['smtp', 'host']],
  ['SMTP_PORT', ['smtp', 'port']],
  ['SMTP_USERNAME', ['smtp', 'username']],
  ['SMTP_PASSWORD', ['smtp', 'password']],
  ['FROM_EMAIL', ['smtp', 'from']],
  ['SMTP_TIMEOUT_MS', ['smtp', 'timeoutMs']],
  ['TO_EMAIL', ['notification', 'to']],
];

function isRecord(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setPath(tree: ConfigTree, path: readonly string[], value: unknown): void {
  let node = tree;
  for (const key of path.slice(0, -1)) {
    const child = node[key];
    if (isRecord(child)) {
      node = child;
    } else {
      const created: ConfigTree = {};
      node[key] = created;
      node = created;
    }
  }
  node[path[path.length - 1]] = value;
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigTree {
    if (!fs.existsSync(filePath)) {
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, { cause: error });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static readEnvFile(filePath: string): Record<string, string> {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    try {
      return dotenv.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      throw new ConfigError(`Error reading env file: ${filePath}`, { cause: error });
    }
  }

  /**
   * Builds a partial config tree from environment variables. Empty values count as unset.
   */
  static fromEnv(env: NodeJS.ProcessEnv): ConfigTree {
    const tree: ConfigTree = {};
    for (const [name, path] of ENV_BINDINGS) {
      const value = env[name];
      if (value !== undefined && value !== '') {
        setPath(tree, path, value);
      }
    }
    return tree;
  }

  static mergeConfigs(target: ConfigTree, source: ConfigTree): ConfigTree {
    const output = { ...target };

    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      if (sourceValue === undefined) {
        continue;
      }

      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  /**
   * Loads and validates the configuration.
   * Precedence: flags > env > env file > config file.
   */
  static load(options: ConfigOptions = {}): Config {
    return this.loadWith(ConfigSchema, options);
  }

  /**
   * Like `load`, validating against `schema` instead of the full config schema.
   */
  static loadWith<S extends z.ZodTypeAny>(schema: S, options: ConfigOptions = {}): z.output<S> {
    const env = options.env ?? process.env;

    const fileConfig = options.configPath ? this.loadYaml(options.configPath) : {};
    const envFileConfig = options.envFile ? this.fromEnv(this.readEnvFile(options.envFile)) : {};
    const envConfig = this.fromEnv(env);
    const flagConfig: ConfigTree = options.flags ?? {};

    let merged = this.mergeConfigs({}, fileConfig);
    merged = this.mergeConfigs(merged, envFileConfig);
    merged = this.mergeConfigs(merged, envConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    const result = schema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`, {
        details: { issues: result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) },
      });
    }

    return result.data;
  }
}
