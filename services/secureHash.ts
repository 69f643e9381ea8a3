/**
 * KEYED HASHING FOR PSEUDONYMS
 *
 * HMAC-SHA256 over a normalized cache key. Same salt + same logical identifier
 * = same code, across documents and process restarts.
 */

import { createHmac } from "crypto";
import { MAX_CODE_LENGTH, MIN_CODE_LENGTH } from "../schemas/config";
import { NAME_LIKE_CATEGORIES, type Category } from "../schemas/taxonomy";
import { HashInputError } from "./errors";

export const FALLBACK_SALT = "DEID_FALLBACK_SALT_NOT_FOR_PRODUCTION";

export interface ResolvedSalt {
  readonly salt: string;
  /** True when running on the fallback salt */
  readonly weak: boolean;
}

export const resolveSalt = (salt: string | undefined): ResolvedSalt => {
  if (salt === undefined || salt.trim() === "" || salt === FALLBACK_SALT) {
    return { salt: FALLBACK_SALT, weak: true };
  }
  return { salt, weak: false };
};

export const hmacDigest = (salt: string, message: string): Buffer =>
  createHmac("sha256", salt).update(message, "utf8").digest();

const hmacHex = (salt: string, message: string): string =>
  hmacDigest(salt, message).toString("hex");

/**
 * Truncated hex code for a cache key. Lengths are clamped to [8, 64].
 *
 * @throws HashInputError when the key is empty
 */
export const secureCode = (salt: string, key: string, length: number): string => {
  if (key.length === 0) {
    throw new HashInputError({ message: "Cannot hash empty text" });
  }
  const width = Math.min(MAX_CODE_LENGTH, Math.max(MIN_CODE_LENGTH, Math.trunc(length)));
  return hmacHex(salt, key).slice(0, width);
};

// ============================================================================
// KEY NORMALIZATION
// ============================================================================

const collapseWhitespace = (text: string): string => text.trim().replace(/\s+/g, " ");

/**
 * "Smith, John", "john smith" and "John Q. Smith" all become "john smith".
 */
export const normalizeName = (text: string): string => {
  const tokens = text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s'-]/gu, " ")
    .split(/\s+/)
    .filter((token) => token.length > 0);
  const kept = tokens.length > 2 ? [tokens[0], tokens[tokens.length - 1]] : tokens;
  return [...kept].sort().join(" ");
};

export const normalizeForKey = (category: Category, text: string): string =>
  NAME_LIKE_CATEGORIES.has(category) ? normalizeName(text) : collapseWhitespace(text).toLowerCase();

/** `[subjectId:]CATEGORY:normalized text` */
export const pseudonymCacheKey = (
  category: Category,
  text: string,
  subjectId?: string
): string => {
  const body = `${category}:${normalizeForKey(category, text)}`;
  return subjectId ? `${subjectId}:${body}` : body;
};
