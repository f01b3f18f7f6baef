import type { TypeSpec } from "../interchange/bundle";
import type { RawOf } from "../syntax/ast";
import { elabError } from "./errors";
import { findCycle } from "./graph";
import type { ConstructIndex } from "./indexer";
import { materializeType, namedRefs } from "./types";

// =========================================================================
// Pass 3: type environment
// =========================================================================

/** Alias name to its fully expanded structural type. */
export type TypeEnv = ReadonlyMap<string, TypeSpec>;

const PASS = 3;

export function buildTypeEnv(index: ConstructIndex): TypeEnv {
  const decls = index.types;
  const names = [...decls.keys()];

  const cycle = findCycle(names, name => {
    const decl = decls.get(name);
    return decl ? namedRefs(decl.type) : [];
  });
  if (cycle) {
    const from = cycle[cycle.length - 2];
    const to = cycle[cycle.length - 1];
    const decl = decls.get(from);
    if (decl) {
      throw elabError(
        PASS,
        { kind: "TypeDecl", id: from, file: decl.file, line: decl.line },
        `type.fields.${referencingField(decl, to)}`,
        `TypeDecl cycle detected: ${cycle.join(" → ")}`
      );
    }
  }

  const env = new Map<string, TypeSpec>();
  const resolve = (name: string): TypeSpec | undefined => {
    const known = env.get(name);
    if (known) return known;
    const decl = decls.get(name);
    if (!decl) return undefined;
    const t = materializeType(decl.type, {
      pass: PASS,
      site: { kind: "TypeDecl", id: decl.id, file: decl.file, line: decl.line },
      field: "type",
      lookup: resolve,
    });
    env.set(name, t);
    return t;
  };

  for (const name of names) resolve(name);
  return env;
}

function referencingField(decl: RawOf<"TypeDecl">, target: string): string {
  const t = decl.type;
  const fields = t.tag === "Record" ? t.fields : t.tag === "TaggedUnion" ? t.variants : [];
  return fields.find(f => namedRefs(f.type).includes(target))?.name ?? "type";
}
