import {
  canonicalizePair,
  compareIdentities,
  counterpartOf,
  isPairMember,
  pairKey
} from "../backend/src/services/pairCanonicalizer";

describe("pairCanonicalizer", () => {
  it("Given two identities in either order When canonicalizePair is called Then both orders yield the same low/high pair", () => {
    const ab = canonicalizePair("u_bob", "u_alice");
    const ba = canonicalizePair("u_alice", "u_bob");

    expect(ab).toEqual({ ok: true, value: { identityLow: "u_alice", identityHigh: "u_bob" } });
    expect(ba).toEqual(ab);
  });

  it("Given identities with surrounding whitespace When canonicalizePair is called Then the pair holds trimmed identities", () => {
    const result = canonicalizePair("  u_b ", "u_a\n");
    expect(result).toEqual({ ok: true, value: { identityLow: "u_a", identityHigh: "u_b" } });
  });

  it("Given the same identity twice When canonicalizePair is called Then it fails with INVALID_PAIR", () => {
    const result = canonicalizePair("u_a", " u_a ");
    expect(result).toEqual({
      ok: false,
      error: { code: "INVALID_PAIR", message: "A pair requires two distinct identities." }
    });
  });

  it("Given an empty identity When canonicalizePair is called Then it fails with INVALID_PAIR", () => {
    const result = canonicalizePair("", "u_a");
    expect(result).toEqual({
      ok: false,
      error: { code: "INVALID_PAIR", message: "Pair members must be non-empty identities." }
    });
    expect(canonicalizePair("u_a", "   ").ok).toBe(false);
  });

  it("Given a shared prefix When compareIdentities is called Then the shorter identity sorts first", () => {
    expect(compareIdentities("ab", "abc")).toBe(-1);
    expect(compareIdentities("abc", "ab")).toBe(1);
    expect(compareIdentities("abc", "abc")).toBe(0);
  });

  it("Given a character outside the basic plane When compareIdentities is called Then it orders by code point rather than UTF-16 unit", () => {
    const astral = "\u{1F600}";
    const lastBmp = "\uFFFF";

    // UTF-16 unit comparison puts the surrogate pair first.
    expect(astral < lastBmp).toBe(true);
    expect(compareIdentities(astral, lastBmp)).toBe(1);
    expect(canonicalizePair(astral, lastBmp)).toEqual({
      ok: true,
      value: { identityLow: lastBmp, identityHigh: astral }
    });
  });

  it("Given a canonical pair When the helpers are used Then key, membership and counterpart agree with the pair", () => {
    const pair = { identityLow: "u_a", identityHigh: "u_b" };

    expect(pairKey(pair)).toBe("u_a::u_b");
    expect(isPairMember(pair, "u_a")).toBe(true);
    expect(isPairMember(pair, " u_b ")).toBe(true);
    expect(isPairMember(pair, "u_c")).toBe(false);
    expect(counterpartOf(pair, "u_a")).toBe("u_b");
    expect(counterpartOf(pair, "u_b")).toBe("u_a");
    expect(counterpartOf(pair, "u_c")).toBeNull();
  });
});
