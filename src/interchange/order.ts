/**
 * Total order on strings by their UTF-8 byte sequence. Canonical output never
 * depends on locale or on UTF-16 code unit order.
 */
export function compareBytes(a: string, b: string): number {
  if (a === b) return 0;
  return Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"));
}

export function sortedByBytes(values: Iterable<string>): string[] {
  return Array.from(values).sort(compareBytes);
}
