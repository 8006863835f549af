/**
 * Network Configuration Loader
 *
 * YAML-based network configuration with:
 * - Environment variable substitution (${VAR} and ${VAR:-default})
 * - Numeric fields read from substituted strings
 * - Schema validation with the failing field reported
 * - Default search paths when no explicit path is given
 */

import * as fs from 'fs';
import * as yaml from 'yaml';
import type { ZodIssue } from 'zod';
import { ConfigLoadError, ConfigValidationError } from './errors.js';
import { DEFAULT_SEARCH_PATHS, NetworkConfigSchema } from './types.js';
import type { NetworkConfig } from './types.js';
import { Perceptron } from '../network/Perceptron.js';
import type { PerceptronOptions } from '../network/types.js';
import { Logger } from '../utils/logger.js';

export interface NetworkConfigLoaderOptions {
  configPath?: string;
  /** Prefix prepended to every substituted variable name */
  envPrefix?: string;
  searchPaths?: string[];
  env?: NodeJS.ProcessEnv;
}

export class NetworkConfigLoader {
  constructor(private options: NetworkConfigLoaderOptions = {}) {}

  load(): NetworkConfig {
    const configPath = this.options.configPath ?? this.findConfigFile();
    if (!configPath) {
      const searched = (this.options.searchPaths ?? DEFAULT_SEARCH_PATHS).join(', ');
      throw new ConfigLoadError(`No network config file found (searched ${searched})`);
    }
    if (!fs.existsSync(configPath)) {
      throw new ConfigLoadError(`Config file not found: ${configPath}`);
    }

    return this.parse(this.loadFile(configPath));
  }

  /**
   * Parse and validate YAML (or JSON) config content
   */
  parse(content: string): NetworkConfig {
    const parsed = this.parseYaml(content);
    return this.validate(this.substituteEnvVars(parsed));
  }

  private findConfigFile(): string | null {
    for (const searchPath of this.options.searchPaths ?? DEFAULT_SEARCH_PATHS) {
      if (fs.existsSync(searchPath)) {
        return searchPath;
      }
    }
    return null;
  }

  private loadFile(path: string): string {
    try {
      return fs.readFileSync(path, 'utf8');
    } catch (e) {
      throw new ConfigLoadError(`Failed to read config file: ${path}`, e instanceof Error ? e : undefined);
    }
  }

  private parseYaml(content: string): unknown {
    try {
      return yaml.parse(content) ?? {};
    } catch (e) {
      throw new ConfigLoadError('Invalid YAML syntax', e instanceof Error ? e : undefined);
    }
  }

  private substituteEnvVars(value: unknown): unknown {
    if (typeof value === 'string') {
      const env = this.options.env ?? process.env;
      // Match ${VAR} or ${VAR:-default}
      return value.replace(/\$\{(\w+)(?::-([^}]*))?\}/g, (_, name: string, defaultVal?: string) => {
        const envName = this.options.envPrefix ? `${this.options.envPrefix}${name}` : name;
        const envValue = env[envName];

        // Empty counts as unset when a default exists
        if (envValue === '' && defaultVal !== undefined) {
          return defaultVal;
        }
        if (envValue === undefined && defaultVal === undefined) {
          throw new ConfigLoadError(`Required environment variable '${envName}' not set`);
        }
        return envValue ?? defaultVal ?? '';
      });
    }
    if (Array.isArray(value)) {
      return value.map((v) => this.substituteEnvVars(v));
    }
    if (typeof value === 'object' && value !== null) {
      return Object.fromEntries(
        Object.entries(value).map(([k, v]) => [k, this.substituteEnvVars(v)])
      );
    }
    return value;
  }

  private validate(data: unknown): NetworkConfig {
    const result = NetworkConfigSchema.safeParse(data);
    if (result.success) {
      return result.data;
    }

    const issue = result.error.errors[0];
    const field = issue.path.join('.');
    throw new ConfigValidationError(
      `Invalid value for ${field || 'config'}: ${issue.message}`,
      field,
      valueAt(data, issue.path),
      expectedType(issue)
    );
  }
}

export function loadNetworkConfig(options: NetworkConfigLoaderOptions = {}): NetworkConfig {
  return new NetworkConfigLoader(options).load();
}

/**
 * Build a perceptron from a loaded config. The config-wide learning rate
 * fills in layers that do not set one.
 */
export function createPerceptron(config: NetworkConfig, options: PerceptronOptions = {}): Perceptron {
  const learningRate = config.training.learningRate;
  const layers = config.layers.map((layer) => ({
    ...layer,
    learningRate: layer.learningRate ?? learningRate,
  }));

  return Perceptron.create(layers, {
    ...options,
    logger: options.logger ?? new Logger({ level: config.logging.level }),
  });
}

function valueAt(data: unknown, path: (string | number)[]): unknown {
  let current = data;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

function expectedType(issue: ZodIssue): string | undefined {
  return issue.code === 'invalid_type' ? issue.expected : undefined;
}
