import type { IntType } from "../interchange/bundle";

/** Range of an Int without declared bounds: signed 64-bit. */
export const INT_MIN = -(2n ** 63n);
export const INT_MAX = 2n ** 63n - 1n;

/** Effective inclusive bounds of an Int type. */
export function intBounds(t: IntType): [bigint, bigint] {
  return [t.min === undefined ? INT_MIN : BigInt(t.min), t.max === undefined ? INT_MAX : BigInt(t.max)];
}

export function inIntRange(t: IntType, n: bigint): boolean {
  const [min, max] = intBounds(t);
  return n >= min && n <= max;
}
