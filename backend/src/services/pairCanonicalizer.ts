export type Identity = string;

export type ErrorCode = "INVALID_PAIR";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = Readonly<{ ok: true; value: T }>;
type ResultErr = Readonly<{ ok: false; error: ServiceError }>;
export type Result<T> = ResultOk<T> | ResultErr;

export type CanonicalPair = Readonly<{
  identityLow: Identity;
  identityHigh: Identity;
}>;

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: ErrorCode, message: string): ResultErr {
  return { ok: false, error: { code, message } };
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

/**
 * Orders identities by Unicode code point, left to right. This matches byte
 * order of the UTF-8 encoding, i.e. PostgreSQL's `COLLATE "C"`.
 * Plain `<` on strings compares UTF-16 code units and disagrees for astral
 * characters, so every pair ordering must go through this function.
 */
export function compareIdentities(a: Identity, b: Identity): number {
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(j) ?? 0;
    if (ca !== cb) return ca < cb ? -1 : 1;
    i += ca > 0xffff ? 2 : 1;
    j += cb > 0xffff ? 2 : 1;
  }
  const restA = a.length - i;
  const restB = b.length - j;
  if (restA === restB) return 0;
  return restA < restB ? -1 : 1;
}

export function canonicalizePair(a: Identity, b: Identity): Result<CanonicalPair> {
  if (!isNonEmptyString(a) || !isNonEmptyString(b)) {
    return err("INVALID_PAIR", "Pair members must be non-empty identities.");
  }
  const x = a.trim();
  const y = b.trim();
  const order = compareIdentities(x, y);
  if (order === 0) {
    return err("INVALID_PAIR", "A pair requires two distinct identities.");
  }
  return ok(order < 0 ? { identityLow: x, identityHigh: y } : { identityLow: y, identityHigh: x });
}

export function pairKey(pair: CanonicalPair): string {
  return `${pair.identityLow}::${pair.identityHigh}`;
}

export function isPairMember(pair: CanonicalPair, identity: Identity): boolean {
  const id = identity.trim();
  return pair.identityLow === id || pair.identityHigh === id;
}

export function counterpartOf(pair: CanonicalPair, identity: Identity): Identity | null {
  const id = identity.trim();
  if (pair.identityLow === id) return pair.identityHigh;
  if (pair.identityHigh === id) return pair.identityLow;
  return null;
}
