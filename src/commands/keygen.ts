import { Command } from 'commander';
import { DECRYPTION_KEY_ENTRY, generateKey } from '../secrets/index.js';

export function createKeygenCommand() {
  return new Command('keygen')
    .description(`Print a new Fernet key, for use as ${DECRYPTION_KEY_ENTRY}`)
    .action(() => {
      process.stdout.write(`${DECRYPTION_KEY_ENTRY}=${generateKey()}\n`);
    });
}
