import { DEFAULT_SUBSAMPLE_SEED, parseSeed } from "../lib/env";

describe("Configuration", () => {
  it("parses seeds from the environment", () => {
    expect(parseSeed(undefined, DEFAULT_SUBSAMPLE_SEED)).toBe(123456);
    expect(parseSeed("  ", 5)).toBe(5);
    expect(parseSeed("42", 5)).toBe(42);
    expect(() => parseSeed("abc", 5)).toThrow(
      "Seed environment value 'abc' must be an integer (env TESTDATA_SEED)"
    );
    expect(() => parseSeed("1.5", 5)).toThrow();
  });
});
