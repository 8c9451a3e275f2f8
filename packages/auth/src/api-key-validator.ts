import type { ApiKey, AuthContext } from "@relaymail/types";
import type { Logger } from "@relaymail/logger";
import {
  generateKeySalt,
  hashApiKey,
  isWellFormedApiKey,
  keyPrefixOf,
  verifyApiKeyHash,
} from "@relaymail/crypto";
import { errorMessage } from "@relaymail/errors";

/**
 * Store access the validator needs. Implemented by the api-key repository.
 */
export interface ApiKeyLookup {
  /** Non-revoked keys sharing a prefix, with their domain allow-lists. */
  findActiveByPrefix(prefix: string): Promise<ApiKey[]>;
  recordUsage(id: string, usedAt: Date, ip: string | null): Promise<void>;
}

// Compared against when no candidate exists so a miss costs the same as a hit.
const DUMMY_SALT = generateKeySalt();
const DUMMY_HASH = hashApiKey("re_00000000000000000000000000000000", DUMMY_SALT);

export function toAuthContext(key: ApiKey): AuthContext {
  return {
    actorType: "api_key",
    actorId: key.keyPrefix,
    apiKeyId: key.id,
    isAdmin: key.isAdmin,
    allowedDomainIds: key.isAdmin ? "all" : key.allowedDomainIds,
  };
}

export class ApiKeyValidator {
  constructor(
    private readonly lookup: ApiKeyLookup,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Resolve a raw bearer key to an actor. Returns null for malformed,
   * unknown and revoked keys alike.
   */
  async validate(rawKey: string, ip: string | null): Promise<AuthContext | null> {
    if (!isWellFormedApiKey(rawKey)) {
      return null;
    }

    const candidates = await this.lookup.findActiveByPrefix(keyPrefixOf(rawKey));

    let match: ApiKey | undefined;
    for (const candidate of candidates) {
      if (verifyApiKeyHash(rawKey, candidate.keySalt, candidate.keyHash) && !match) {
        match = candidate;
      }
    }

    if (candidates.length === 0) {
      verifyApiKeyHash(rawKey, DUMMY_SALT, DUMMY_HASH);
    }

    if (!match || match.revokedAt !== null) {
      return null;
    }

    try {
      await this.lookup.recordUsage(match.id, this.now(), ip);
    } catch (err) {
      this.logger.warn(
        { apiKeyId: match.id, error: errorMessage(err) },
        "Failed to record API key usage",
      );
    }

    return toAuthContext(match);
  }
}
