import { digestsEqual, hashApiKey, isApiKeyDigest, toIdentityDigest } from "./crypto";

export type CreateCredentialStoreInput = {
  apiKeys: string[];
  apiKeyHashes?: string[];
};

export type VerifiedCredential = {
  digest: string;
  identityDigest: string;
};

export type CredentialStore = {
  readonly size: number;
  verify: (candidate: string) => VerifiedCredential | null;
};

type StoredDigest = {
  digest: string;
  acceptsDigestPresentation: boolean;
};

const normalizeEntries = (values: string[]): string[] => {
  const normalized = values.map((entry) => entry.trim()).filter(Boolean);
  return [...new Set(normalized)];
};

const normalizeHashes = (values: string[]): string[] => {
  const normalized = normalizeEntries(values).map((entry) => entry.toLowerCase());
  const invalid = normalized.find((entry) => !isApiKeyDigest(entry));
  if (invalid) {
    throw new Error(`Invalid API key hash: expected 64 hex characters, got ${invalid.length}`);
  }

  return normalized;
};

const findMatch = (entries: readonly StoredDigest[], candidateDigest: string, digestPresentation: boolean): string | null => {
  let matched: string | null = null;

  // Walk every entry so the comparison count does not depend on where a match sits.
  for (const entry of entries) {
    if (digestPresentation && !entry.acceptsDigestPresentation) {
      continue;
    }

    if (digestsEqual(entry.digest, candidateDigest) && matched === null) {
      matched = entry.digest;
    }
  }

  return matched;
};

/**
 * Builds the immutable set of accepted credentials.
 *
 * Plaintext keys are accepted in either form: the key itself or its SHA-256
 * hex digest. Entries configured only by digest accept the plaintext alone,
 * so a leaked digest list is not a list of usable credentials.
 */
export const createCredentialStore = (input: CreateCredentialStoreInput): CredentialStore => {
  const plainDigests = normalizeEntries(input.apiKeys).map(hashApiKey);
  const hashOnly = normalizeHashes(input.apiKeyHashes ?? []).filter((digest) => !plainDigests.includes(digest));

  const entries: readonly StoredDigest[] = Object.freeze([
    ...plainDigests.map((digest) => ({ digest, acceptsDigestPresentation: true })),
    ...hashOnly.map((digest) => ({ digest, acceptsDigestPresentation: false })),
  ]);

  const verify = (candidate: string): VerifiedCredential | null => {
    if (!candidate) {
      return null;
    }

    const matched =
      findMatch(entries, hashApiKey(candidate), false) ??
      (isApiKeyDigest(candidate.toLowerCase()) ? findMatch(entries, candidate.toLowerCase(), true) : null);

    if (!matched) {
      return null;
    }

    return {
      digest: matched,
      identityDigest: toIdentityDigest(matched),
    };
  };

  return {
    size: entries.length,
    verify,
  };
};
