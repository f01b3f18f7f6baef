import type { RawOf } from "../../syntax/ast";
import { elabError, siteOf } from "../errors";

const PASS = 5;

/** Fields each built-in protocol needs. */
const REQUIRED_FIELDS: ReadonlyMap<string, readonly string[]> = new Map([
  ["http", ["base_url"]],
  ["database", ["dialect"]],
  ["graphql", ["endpoint"]],
  ["grpc", ["endpoint"]],
  ["static", []],
  ["manual", []],
]);

const EXTENSION_SEGMENT = /^[a-z][a-z0-9_]*$/;

function isExtensionTag(tag: string): boolean {
  return tag.startsWith("x_") && tag.length > 2 && tag.slice(2).split(".").every(s => EXTENSION_SEGMENT.test(s));
}

export function validateSource(source: RawOf<"Source">): void {
  const required = REQUIRED_FIELDS.get(source.protocol);
  if (required === undefined) {
    if (isExtensionTag(source.protocol)) return;
    const message = source.protocol.startsWith("x_")
      ? `invalid extension protocol tag '${source.protocol}'`
      : `unknown protocol tag '${source.protocol}'`;
    throw elabError(PASS, siteOf(source), "protocol", message);
  }

  const present = new Set(source.fields.map(([k]) => k));
  for (const field of required) {
    if (!present.has(field)) {
      throw elabError(
        PASS,
        siteOf(source),
        "protocol",
        `source '${source.id}' with protocol '${source.protocol}' is missing required field '${field}'`
      );
    }
  }
}
