/**
 * Loads `.unitcheck.yaml`, falling back to defaults.
 */
import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { fileExists } from '../../utils/file-system.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = '.unitcheck.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file. A missing default config file yields the
 * defaults; a missing file that was asked for explicitly is an error.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `config file not found: ${fullPath}`, { path: fullPath });
    }
    return getDefaultConfig();
  }

  return loadYamlWithSchema(fullPath, ConfigSchema);
}
