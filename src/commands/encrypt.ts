import { Command } from 'commander';
import { logger } from '../utils/logger.js';
import { isScriptdocError } from '../errors.js';
import {
  DECRYPTION_KEY_ENTRY,
  ENCRYPTED_CREDENTIAL_ENTRY,
  encryptToken,
  loadDecryptionKey,
} from '../secrets/index.js';

interface EncryptOptions {
  key?: string;
  envFile?: string;
}

export function createEncryptCommand() {
  return new Command('encrypt')
    .description(`Encrypt an API key with the Fernet key, for use as ${ENCRYPTED_CREDENTIAL_ENTRY}`)
    .argument('<value>', 'Plaintext API key to encrypt')
    .option('--key <fernetKey>', `Fernet key (defaults to ${DECRYPTION_KEY_ENTRY})`)
    .option('--env-file <path>', 'Path to the .env file holding the Fernet key')
    .action(async (value: string, options: EncryptOptions) => {
      try {
        const key = options.key ?? (await loadDecryptionKey({ envPath: options.envFile }));
        process.stdout.write(`${ENCRYPTED_CREDENTIAL_ENTRY}=${encryptToken(key, value)}\n`);
      } catch (error) {
        if (isScriptdocError(error)) {
          logger.error(error.message);
        } else {
          logger.error('Failed to encrypt value:', error);
        }
        process.exitCode = 1;
      }
    });
}
