export * from "./bundle";
export * from "./meta";
export * from "./version";
export { encodeCanonical, encodeBundle, decodeBundle, BundleDecodeError, type EncodeOptions } from "./codec";
export { decodeExpr, decodeType } from "./decode";
export { bundleDigest, type BundleDigest } from "./hash";
export { compareBytes, sortedByBytes } from "./order";
export { formatType } from "./format";
