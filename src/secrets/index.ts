export {
  decryptToken,
  encryptToken,
  generateKey,
  isValidKey,
  type DecryptOptions,
  type EncryptOptions,
} from './fernet.js';

export {
  loadConfigBundle,
  loadDecryptionKey,
  locateEnvFile,
  envFileCandidates,
  DECRYPTION_KEY_ENTRY,
  ENCRYPTED_CREDENTIAL_ENTRY,
  ENV_PATH_VARIABLE,
  type ConfigBundle,
  type SecretSource,
  type KeyValueSource,
} from './store.js';
