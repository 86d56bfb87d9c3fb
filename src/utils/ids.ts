// X 스노플레이크 ID 비교 (숫자 문자열)
function toBigInt(id: string): bigint | null {
  if (!/^\d+$/.test(id)) return null;
  return BigInt(id);
}

/**
 * True when `candidate` is a strictly later snowflake id than `reference`.
 * Falls back to length-then-lexical order for non-numeric ids.
 */
export function isNewerId(candidate: string, reference: string | null | undefined): boolean {
  if (!reference) return true;
  const a = toBigInt(candidate);
  const b = toBigInt(reference);
  if (a !== null && b !== null) return a > b;
  if (candidate.length !== reference.length) return candidate.length > reference.length;
  return candidate > reference;
}
