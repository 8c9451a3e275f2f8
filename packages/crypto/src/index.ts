export { deriveKey, generateSalt, hashPassword, verifyPassword } from "./key-derivation.js";

export {
  API_KEY_PREFIX,
  ADMIN_API_KEY_PREFIX,
  KEY_PREFIX_LENGTH,
  generateApiKey,
  generateKeySalt,
  hashApiKey,
  isWellFormedApiKey,
  keyPrefixOf,
  verifyApiKeyHash,
} from "./api-key.js";
export type { GeneratedApiKey } from "./api-key.js";
