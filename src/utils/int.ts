const INT64_MAX = 2n ** 63n - 1n;

/** Parses a run of decimal digits as a signed 64-bit value; undefined when out of range. */
export function parseInt64(digits: string): bigint | undefined {
  if (!/^\d+$/.test(digits)) return undefined;
  const n = BigInt(digits);
  return n <= INT64_MAX ? n : undefined;
}
