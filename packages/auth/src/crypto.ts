import { createHash, randomBytes, timingSafeEqual } from "node:crypto";

export const API_KEY_DIGEST_PATTERN = /^[0-9a-f]{64}$/;

export const IDENTITY_DIGEST_LENGTH = 8;

export const hashApiKey = (apiKey: string): string => createHash("sha256").update(apiKey, "utf8").digest("hex");

export const generateApiKey = (byteLength = 32): string => {
  const size = Math.max(16, Math.floor(byteLength));
  return randomBytes(size).toString("base64url");
};

export const isApiKeyDigest = (value: string): boolean => API_KEY_DIGEST_PATTERN.test(value);

/**
 * Truncated digest used to key per-client state. Short enough for logs and
 * bucket names; not a security identifier.
 */
export const toIdentityDigest = (digest: string): string => digest.slice(0, IDENTITY_DIGEST_LENGTH);

export const digestsEqual = (expectedHex: string, receivedHex: string): boolean => {
  if (!isApiKeyDigest(expectedHex) || !isApiKeyDigest(receivedHex)) {
    return false;
  }

  return timingSafeEqual(Buffer.from(expectedHex, "hex"), Buffer.from(receivedHex, "hex"));
};
