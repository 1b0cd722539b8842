import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { ConfigSchema, type Config } from './schema.js';
import { ConfigError } from '../errors.js';
import { logger } from '../utils/logger.js';

export const CONFIG_FILE_NAME = 'scriptdoc.config.json';

export async function loadConfig(cwd: string): Promise<Config> {
  const configPath = resolve(cwd, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      logger.debug('No config file found, using defaults');
      return ConfigSchema.parse({});
    }
    throw ConfigError.invalid(`Failed to read ${configPath}`, error);
  }

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch (error) {
    throw ConfigError.invalid(`${configPath} is not valid JSON`, error);
  }

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw ConfigError.invalid(`Invalid ${CONFIG_FILE_NAME}: ${issues}`, result.error);
  }

  logger.debug(`Loaded config from ${configPath}`);
  return result.data;
}
