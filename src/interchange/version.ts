// Language version stamped on every bundle, and the bundle format version.
export const COVENANT_VERSION = "1.0" as const;
export const BUNDLE_FORMAT_VERSION = "1.1.0" as const;
