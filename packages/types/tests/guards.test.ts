/**
 * Runtime type guard tests for @yield-proxy/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import { isAddressLike, isHexBytes, isFeeBps } from "../src/guards.js";

const TARGET = "0x00000000000000000000000000000000000000aa";

// =============================================================================
// Byte-string guards
// =============================================================================

describe("isAddressLike", () => {
  it("accepts a 20-byte hex address", () => {
    expect(isAddressLike(TARGET)).toBe(true);
  });

  it("accepts mixed case", () => {
    expect(isAddressLike("0x00000000000000000000000000000000000000AB")).toBe(true);
  });

  it("rejects a short address", () => {
    expect(isAddressLike("0x1234")).toBe(false);
  });

  it("rejects missing prefix", () => {
    expect(isAddressLike("00000000000000000000000000000000000000aa")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isAddressLike(42)).toBe(false);
    expect(isAddressLike(null)).toBe(false);
  });
});

describe("isHexBytes", () => {
  it("accepts empty bytes", () => {
    expect(isHexBytes("0x")).toBe(true);
  });

  it("accepts whole bytes", () => {
    expect(isHexBytes("0xdeadbeef")).toBe(true);
  });

  it("rejects odd nibble count", () => {
    expect(isHexBytes("0xabc")).toBe(false);
  });

  it("rejects non-hex characters", () => {
    expect(isHexBytes("0xzz")).toBe(false);
  });
});

// =============================================================================
// Financial guards
// =============================================================================

describe("isFeeBps", () => {
  it("accepts the bounds 1 and 10000", () => {
    expect(isFeeBps(1)).toBe(true);
    expect(isFeeBps(10_000)).toBe(true);
  });

  it("rejects 0 and 10001", () => {
    expect(isFeeBps(0)).toBe(false);
    expect(isFeeBps(10_001)).toBe(false);
  });

  it("rejects fractions and strings", () => {
    expect(isFeeBps(87.5)).toBe(false);
    expect(isFeeBps("8700")).toBe(false);
  });
});
