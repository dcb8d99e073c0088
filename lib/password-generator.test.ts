import { describe, expect, it } from "vitest";
import { generatePassword, generatorCharset, normalizeGeneratorOptions } from "@/lib/password-generator";

describe("generatePassword", () => {
  it("produces the requested length", () => {
    expect(generatePassword({ length: 8, useDigits: true, useSpecial: true })).toHaveLength(8);
    expect(generatePassword({ length: 64, useDigits: true, useSpecial: true })).toHaveLength(64);
  });

  it("returns an empty string for non-positive lengths", () => {
    expect(generatePassword({ length: 0, useDigits: true, useSpecial: true })).toBe("");
    expect(generatePassword({ length: -5, useDigits: true, useSpecial: true })).toBe("");
  });

  it("draws only letters when digits and specials are off", () => {
    const pwd = generatePassword({ length: 200, useDigits: false, useSpecial: false });
    expect(pwd).toMatch(/^[A-Za-z]{200}$/);
  });

  it("draws only from the enabled pool", () => {
    expect(generatePassword({ length: 200, useDigits: true, useSpecial: false })).toMatch(/^[A-Za-z0-9]{200}$/);
    expect(generatePassword({ length: 200, useDigits: false, useSpecial: true })).toMatch(/^[A-Za-z!@#$%^&*]{200}$/);
  });

  it("differs between calls", () => {
    const opts = { length: 32, useDigits: true, useSpecial: true };
    expect(generatePassword(opts)).not.toBe(generatePassword(opts));
  });
});

describe("generatorCharset", () => {
  it("adds digits and the eight specials on request", () => {
    expect(generatorCharset({ useDigits: false, useSpecial: false })).toHaveLength(52);
    expect(generatorCharset({ useDigits: true, useSpecial: false })).toHaveLength(62);
    expect(generatorCharset({ useDigits: false, useSpecial: true }).slice(52)).toBe("!@#$%^&*");
    expect(generatorCharset({ useDigits: true, useSpecial: true })).toHaveLength(70);
  });
});

describe("normalizeGeneratorOptions", () => {
  it("defaults to 12 characters with digits and specials", () => {
    expect(normalizeGeneratorOptions()).toEqual({ length: 12, useDigits: true, useSpecial: true });
  });

  it("falls back to the default for lengths under four", () => {
    expect(normalizeGeneratorOptions({ length: 3 }).length).toBe(12);
    expect(normalizeGeneratorOptions({ length: 0 }).length).toBe(12);
    expect(normalizeGeneratorOptions({ length: 4 }).length).toBe(4);
  });

  it("falls back to the default for fractional lengths", () => {
    expect(normalizeGeneratorOptions({ length: 7.5 }).length).toBe(12);
  });

  it("keeps explicit flags", () => {
    expect(normalizeGeneratorOptions({ length: 20, useDigits: false, useSpecial: false })).toEqual({
      length: 20,
      useDigits: false,
      useSpecial: false,
    });
  });
});
