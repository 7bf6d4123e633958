// Configuration loading logic
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError, type TestbedConfig } from '../types';
import type { ConfigLoader, ConfigValidationResult } from './types';
import { validateAndNormalizeConfig, validateConfig } from './validator';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Configuration loader that supports YAML and JSON files with environment variable substitution
 */
export class TestbedConfigLoader implements ConfigLoader {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load, resolve and validate a configuration file
   * @param path - Path to the configuration file (YAML or JSON)
   * @throws ConfigurationError if the file is missing, unparseable or invalid
   */
  async load(path: string): Promise<TestbedConfig> {
    if (!existsSync(path)) {
      throw new ConfigurationError(`Configuration file not found: ${path}`);
    }

    const content = await readFile(path, 'utf-8');

    let rawConfig: unknown;
    try {
      rawConfig = this.parse(path, content);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      throw new ConfigurationError(
        `Failed to parse configuration from ${path}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!isPlainObject(rawConfig)) {
      throw new ConfigurationError(`Configuration in ${path} must be a mapping`);
    }

    const configWithEnvVars = this.resolveEnvironmentVariables(rawConfig);
    const config = validateAndNormalizeConfig(configWithEnvVars);

    // Template paths are relative to the file that names them
    config.vcd.template_dir = resolve(dirname(path), config.vcd.template_dir);
    return config;
  }

  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /**
   * Load the first configuration file that exists among the search paths
   */
  async loadFromPaths(searchPaths: string[]): Promise<TestbedConfig> {
    const existing = searchPaths.find(path => existsSync(path));
    if (!existing) {
      throw new ConfigurationError(
        'Could not find a configuration file in any of the searched paths',
        searchPaths
      );
    }
    return this.load(existing);
  }

  private parse(path: string, content: string): unknown {
    if (path.endsWith('.json')) {
      return JSON.parse(content);
    }
    if (path.endsWith('.yml') || path.endsWith('.yaml')) {
      return parseYaml(content);
    }
    throw new ConfigurationError(
      'Unsupported file format. Only .json, .yml, and .yaml files are supported.'
    );
  }

  /**
   * Recursively resolve environment variables in configuration object
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
   */
  private resolveEnvironmentVariables(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item));
    }

    if (isPlainObject(value)) {
      const result: PlainObject = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(entry);
      }
      return result;
    }

    return value;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = this.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset with no default: keep the placeholder
      return match;
    });
  }
}

export function createConfigLoader(env?: NodeJS.ProcessEnv): TestbedConfigLoader {
  return new TestbedConfigLoader(env);
}

export const DEFAULT_CONFIG_PATHS: readonly string[] = [
  './vcd-testbed.yml',
  './vcd-testbed.yaml',
  './vcd-testbed.json',
  './base_config.yaml'
];

/**
 * Load configuration from the standard locations in the working directory
 */
export async function loadDefaultConfig(): Promise<TestbedConfig> {
  return createConfigLoader().loadFromPaths([...DEFAULT_CONFIG_PATHS]);
}
