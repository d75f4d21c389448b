import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = 'wrapgen.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the default file doesn't exist; an explicitly
 * requested file must exist. A relative `tsconfig` is resolved against the
 * directory of the config file.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError('CONFIG_NOT_FOUND', `Config file not found: ${fullPath}`, { path: fullPath });
    }
    return getDefaultConfig();
  }

  let config: Config;
  try {
    config = await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        'CONFIG_LOAD_ERROR',
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }

  if (config.tsconfig) {
    config.tsconfig = path.resolve(path.dirname(fullPath), config.tsconfig);
  }
  return config;
}

/**
 * Merge partial config with defaults. The CLI uses it to lay its options
 * over the loaded file.
 */
export function mergeConfig(partial: Partial<Config>): Config {
  return ConfigSchema.parse(partial);
}

/**
 * Methods the transaction pattern should run without a transaction for the
 * given interface.
 */
export function readOnlyMethodsFor(config: Config, interfaceName: string): string[] {
  return config.transaction.read_only[interfaceName] ?? [];
}
