import { parseSource } from "../syntax/parser";
import type { RawConstruct, RawDeclaration, RawOf } from "../syntax/ast";
import { ElabError, elabError } from "./errors";
import { findCycle } from "./graph";
import { isWithin, type SourceProvider } from "./source";

// =========================================================================
// Pass 1: import resolution and bundle assembly
// =========================================================================

export interface AssembledContract {
  /** Stem of the root file name. */
  bundleId: string;
  /** Every declaration, imported files first, each file once. */
  constructs: RawDeclaration[];
}

interface LoadedFile {
  canonical: string;
  display: string;
  constructs: RawConstruct[];
  imports: { target: string; decl: RawOf<"Import"> }[];
}

const PASS = 1;

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function assemble(rootFile: string, provider: SourceProvider, sandboxRoot?: string): AssembledContract {
  let root: string;
  try {
    root = provider.canonical(rootFile);
  } catch (e) {
    throw new ElabError({ pass: PASS, file: rootFile, line: 0, message: `cannot read file '${rootFile}': ${describe(e)}` });
  }

  const rootDir = provider.dirname(root);
  let sandbox = rootDir;
  if (sandboxRoot !== undefined) {
    try {
      sandbox = provider.canonical(sandboxRoot);
    } catch (e) {
      const site = { file: provider.relative(rootDir, root), line: 0 };
      throw elabError(PASS, site, "import", `cannot resolve contract root '${sandboxRoot}': ${describe(e)}`);
    }
  }
  const files = new Map<string, LoadedFile>();

  const load = (canonical: string): LoadedFile => {
    const display = provider.relative(rootDir, canonical);
    let text: string;
    try {
      text = provider.read(canonical);
    } catch (e) {
      throw new ElabError({ pass: PASS, file: display, line: 0, message: `cannot read file '${display}': ${describe(e)}` });
    }

    const constructs = parseSource(text, display);
    const file: LoadedFile = { canonical, display, constructs, imports: [] };
    files.set(canonical, file);
    checkTypeLibrary(file);

    for (const c of constructs) {
      if (c.tag !== "Import") continue;
      const site = { file: display, line: c.line };

      let target: string;
      try {
        target = provider.canonical(provider.resolve(provider.dirname(canonical), c.path));
      } catch {
        throw elabError(PASS, site, "import", `import resolution failed: cannot resolve path '${c.path}'`);
      }
      if (!isWithin(sandbox, target, provider)) {
        throw elabError(PASS, site, "import", `import '${c.path}' escapes the contract root directory`);
      }

      file.imports.push({ target, decl: c });
      if (!files.has(target)) load(target);
    }
    return file;
  };

  load(root);
  checkImportCycles(files);

  const constructs: RawDeclaration[] = [];
  const emitted = new Set<string>();
  const emit = (file: LoadedFile) => {
    if (emitted.has(file.canonical)) return;
    emitted.add(file.canonical);
    for (const imp of file.imports) {
      const target = files.get(imp.target);
      if (target) emit(target);
    }
    for (const c of file.constructs) {
      if (c.tag !== "Import") constructs.push(c);
    }
  };
  const rootFileEntry = files.get(root);
  if (rootFileEntry) emit(rootFileEntry);

  checkCrossFileDuplicates(constructs);

  const rootName = provider.relative(rootDir, root);
  const base = rootName.slice(rootName.lastIndexOf("/") + 1);
  const dot = base.lastIndexOf(".");
  return { bundleId: dot > 0 ? base.slice(0, dot) : base, constructs };
}

/**
 * A file holding nothing but type declarations is a type library and may not
 * import anything itself.
 */
function checkTypeLibrary(file: LoadedFile): void {
  const decls = file.constructs.filter(c => c.tag !== "Import");
  const firstImport = file.constructs.find(c => c.tag === "Import");
  if (!firstImport || decls.length === 0 || !decls.every(c => c.tag === "TypeDecl")) return;
  throw elabError(
    PASS,
    { file: file.display, line: firstImport.line },
    "import",
    `type library '${file.display}' may not import other files; type libraries must be self-contained`
  );
}

function checkImportCycles(files: Map<string, LoadedFile>): void {
  const cycle = findCycle([...files.keys()], node => files.get(node)?.imports.map(i => i.target) ?? []);
  if (!cycle) return;

  const from = files.get(cycle[cycle.length - 2]);
  const closing = from?.imports.find(i => i.target === cycle[cycle.length - 1]);
  const names = cycle.map(c => files.get(c)?.display ?? c);
  throw elabError(
    PASS,
    { file: from?.display ?? names[0], line: closing?.decl.line ?? 0 },
    "import",
    `import cycle detected: ${names.join(" → ")}`
  );
}

function checkCrossFileDuplicates(constructs: RawDeclaration[]): void {
  const seen = new Map<string, RawDeclaration>();
  for (const c of constructs) {
    const key = `${c.tag}\u0000${c.id}`;
    const first = seen.get(key);
    if (!first) {
      seen.set(key, c);
      continue;
    }
    if (first.file !== c.file) {
      throw elabError(
        PASS,
        { kind: c.tag, id: c.id, file: c.file, line: c.line },
        "id",
        `duplicate ${c.tag} id '${c.id}': first declared in ${first.file}`
      );
    }
  }
}
