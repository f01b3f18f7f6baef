import { compareBytes } from "./order";
import type { Bundle } from "./bundle";
import { BundleDecodeError, decodeBundleValue } from "./decode";

export { BundleDecodeError };

export interface EncodeOptions {
  /** Indentation width; omitted for the compact form. */
  indent?: number;
}

/**
 * Canonical JSON: object keys sorted by byte value at every depth, arrays kept in
 * their given order, `undefined` members dropped.
 */
export function encodeCanonical(value: unknown, options?: EncodeOptions): string {
  const text = JSON.stringify(value, (_key, v: unknown) => {
    if (typeof v === "bigint") {
      throw new TypeError("canonical encoding cannot represent bigint values");
    }
    if (typeof v === "number" && !Number.isSafeInteger(v)) {
      throw new TypeError(`canonical encoding only carries safe integers, got ${v}`);
    }
    if (isPlainObject(v)) {
      const sorted: Record<string, unknown> = {};
      for (const k of Object.keys(v).sort(compareBytes)) sorted[k] = v[k];
      return sorted;
    }
    return v;
  }, options?.indent);
  if (text === undefined) {
    throw new TypeError("value has no JSON representation");
  }
  return text;
}

export function encodeBundle(bundle: Bundle, options?: EncodeOptions): string {
  return encodeCanonical(bundle, options);
}

/**
 * Parse and structurally validate an interchange document.
 */
export function decodeBundle(json: string): Bundle {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    throw new BundleDecodeError(`invalid JSON: ${e instanceof Error ? e.message : String(e)}`, "$");
  }
  return decodeBundleValue(parsed);
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
