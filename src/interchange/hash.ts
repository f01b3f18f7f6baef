import { createHash } from "crypto";
import type { Bundle } from "./bundle";
import { encodeCanonical } from "./codec";

export type BundleDigest = `sha256:${string}`;

/**
 * Content hash of a bundle, computed over its compact canonical encoding.
 */
export function bundleDigest(bundle: Bundle): BundleDigest {
  const digest = createHash("sha256").update(encodeCanonical(bundle)).digest("hex");
  return `sha256:${digest}`;
}
