// Configuration-specific types
import type { TestbedConfig } from '../types';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoader {
  load(path: string): Promise<TestbedConfig>;
  validate(config: unknown): ConfigValidationResult;
}
