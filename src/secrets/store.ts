import { access, readFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { parse } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { PACKAGE_ROOT } from '../utils/paths.js';

export const DECRYPTION_KEY_ENTRY = 'ENCRYPTION_PASSWORD';
export const ENCRYPTED_CREDENTIAL_ENTRY = 'OPENAI_API_KEY_ENC';
export const ENV_PATH_VARIABLE = 'SCRIPTDOC_ENV_PATH';

export type KeyValueSource = Record<string, string | undefined>;

export interface SecretSource {
  /** Explicit dotenv path, tried before anything else */
  envPath?: string;
  cwd?: string;
  /** Process environment; its entries win over the dotenv file */
  env?: KeyValueSource;
  /** Directory the package is installed in */
  packageRoot?: string;
}

export interface ConfigBundle {
  readonly decryptionKey: string;
  readonly encryptedCredential: string;
  /** The dotenv file the bundle was read from */
  readonly sourcePath: string;
}

const entry = z.string().trim().min(1);

/**
 * Every place a dotenv file is looked for, in priority order
 */
export function envFileCandidates(source: SecretSource = {}): string[] {
  const env = source.env ?? process.env;
  const cwd = source.cwd ?? process.cwd();
  const packageRoot = source.packageRoot ?? PACKAGE_ROOT;
  const packageParent = dirname(packageRoot);

  const within = (root: string) => [resolve(root, 'config', '.env'), resolve(root, '.env')];

  const candidates: string[] = [];
  if (source.envPath) {
    candidates.push(resolve(cwd, source.envPath));
  }
  const fromEnv = env[ENV_PATH_VARIABLE];
  if (fromEnv) {
    candidates.push(resolve(cwd, fromEnv));
  }
  candidates.push(...within(cwd), ...within(packageRoot), ...within(packageParent));

  return [...new Set(candidates)];
}

/**
 * Find the first dotenv file that exists
 */
export async function locateEnvFile(source: SecretSource = {}): Promise<string> {
  const candidates = envFileCandidates(source);

  for (const candidate of candidates) {
    try {
      await access(candidate);
      return candidate;
    } catch {
      logger.debug(`No .env at ${candidate}`);
    }
  }

  throw ConfigError.missingSource(candidates);
}

interface EnvValues {
  sourcePath: string;
  values: KeyValueSource;
}

async function loadEnvValues(source: SecretSource): Promise<EnvValues> {
  const sourcePath = await locateEnvFile(source);

  let fileValues: KeyValueSource;
  try {
    fileValues = parse(await readFile(sourcePath, 'utf-8'));
  } catch (error) {
    throw ConfigError.invalid(`Failed to load .env at ${sourcePath}`, error);
  }
  logger.debug(`Loaded .env from ${sourcePath}`);

  return { sourcePath, values: { ...fileValues, ...pickDefined(source.env ?? process.env) } };
}

/**
 * Load the decryption key and encrypted credential.
 * Values already present in the environment take precedence over the file.
 */
export async function loadConfigBundle(source: SecretSource = {}): Promise<ConfigBundle> {
  const { sourcePath, values } = await loadEnvValues(source);

  return Object.freeze({
    decryptionKey: requireEntry(values, DECRYPTION_KEY_ENTRY),
    encryptedCredential: requireEntry(values, ENCRYPTED_CREDENTIAL_ENTRY),
    sourcePath,
  });
}

/**
 * Read the decryption key alone, for encrypting new credentials
 */
export async function loadDecryptionKey(source: SecretSource = {}): Promise<string> {
  const env = source.env ?? process.env;
  const fromEnv = env[DECRYPTION_KEY_ENTRY];
  if (fromEnv) {
    return fromEnv;
  }
  const { values } = await loadEnvValues(source);
  return requireEntry(values, DECRYPTION_KEY_ENTRY);
}

function requireEntry(values: KeyValueSource, name: string): string {
  const result = entry.safeParse(values[name]);
  if (!result.success) {
    throw ConfigError.missingKey(name);
  }
  return result.data;
}

function pickDefined(env: KeyValueSource): KeyValueSource {
  return Object.fromEntries(
    [DECRYPTION_KEY_ENTRY, ENCRYPTED_CREDENTIAL_ENTRY]
      .filter((name) => env[name] !== undefined && env[name] !== '')
      .map((name) => [name, env[name]])
  );
}
