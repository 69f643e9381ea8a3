import { describe, it, expect } from "vitest";
import {
  FALLBACK_SALT,
  normalizeName,
  pseudonymCacheKey,
  resolveSalt,
  secureCode,
} from "../services/secureHash";
import { HashInputError } from "../services/errors";
import { TEST_PHI, TEST_SALT } from "../services/testConstants";

/**
 * KEYED HASHING TESTS
 *
 * Codes depend only on the salt and the normalized identifier, so the same
 * patient gets the same pseudonym in every document.
 */

describe("normalizeName", () => {
  it("ignores token order, case and punctuation", () => {
    expect(normalizeName(TEST_PHI.NAME_PATIENT)).toBe("patient test");
    expect(normalizeName(TEST_PHI.NAME_PATIENT_REVERSED)).toBe("patient test");
    expect(normalizeName("TEST  patient")).toBe("patient test");
  });

  it("drops middle names and initials", () => {
    expect(normalizeName("Test Q. Patient")).toBe("patient test");
  });
});

describe("pseudonymCacheKey", () => {
  it("prefixes the subject when one is given", () => {
    expect(pseudonymCacheKey("NAME", "Patient, Test", "s1")).toBe("s1:NAME:patient test");
    expect(pseudonymCacheKey("MRN", "  TEST000001 ")).toBe("MRN:test000001");
  });
});

describe("secureCode", () => {
  it("returns lowercase hex of the requested length", () => {
    expect(secureCode(TEST_SALT, "NAME:patient test", 8)).toMatch(/^[0-9a-f]{8}$/);
    expect(secureCode(TEST_SALT, "MRN:test000001", 12)).toMatch(/^[0-9a-f]{12}$/);
  });

  it("is deterministic and salt dependent", () => {
    const key = "NAME:patient test";

    expect(secureCode(TEST_SALT, key, 8)).toBe(secureCode(TEST_SALT, key, 8));
    expect(secureCode(TEST_SALT, key, 8)).not.toBe(secureCode("other-test-secret", key, 8));
  });

  it("clamps lengths to [8, 64]", () => {
    expect(secureCode(TEST_SALT, "k", 2)).toHaveLength(8);
    expect(secureCode(TEST_SALT, "k", 100)).toHaveLength(64);
  });

  it("throws HashInputError on an empty key", () => {
    expect(() => secureCode(TEST_SALT, "", 8)).toThrow(HashInputError);
  });
});

describe("resolveSalt", () => {
  it("flags missing, blank and fallback salts as weak", () => {
    expect(resolveSalt(undefined)).toEqual({ salt: FALLBACK_SALT, weak: true });
    expect(resolveSalt("   ")).toEqual({ salt: FALLBACK_SALT, weak: true });
    expect(resolveSalt(FALLBACK_SALT).weak).toBe(true);
    expect(resolveSalt(TEST_SALT)).toEqual({ salt: TEST_SALT, weak: false });
  });
});
