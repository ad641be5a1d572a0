export { CredentialVault, CredentialDecryptionError } from './credential-vault.js';
export { parseEncryptionKey, KEY_LENGTH_BYTES } from './key.js';
