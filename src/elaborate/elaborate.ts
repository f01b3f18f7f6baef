import type { Bundle } from "../interchange/bundle";
import { done, fail } from "../outcome/constructors";
import type { Outcome } from "../outcome/outcome";
import { nullTraceSink, type TraceSink } from "../ports/trace";
import { assemble } from "./assemble";
import { isElabError, type ElabError } from "./errors";
import { buildIndex } from "./indexer";
import { serialize } from "./serialize";
import { FileSystemSource, InMemorySource, type SourceProvider } from "./source";
import { buildTypeEnv } from "./typeEnv";
import { typecheck } from "./typecheck";
import { validate } from "./validate";

export interface ElaborateOptions {
  /** Defaults to the file system. */
  provider?: SourceProvider;
  /** Imports may not leave this directory. Defaults to the root file's directory. */
  sandboxRoot?: string;
  trace?: TraceSink;
}

/**
 * Run passes 0 through 6 over `rootFile` and everything it imports. The first
 * elaboration error ends the run; any other exception propagates.
 */
export function elaborate(rootFile: string, options: ElaborateOptions = {}): Outcome<Bundle, ElabError> {
  const provider = options.provider ?? new FileSystemSource();
  const trace = options.trace ?? nullTraceSink;
  const started = Date.now();

  const timed = <T>(pass: number, name: string, run: () => T): T => {
    const t0 = Date.now();
    const result = run();
    trace.emit({ tag: "E_PassCompleted", pass, name, durationMs: Date.now() - t0 });
    return result;
  };

  try {
    // passes 0 and 1 interleave: each file is parsed as its import is reached
    const assembled = timed(1, "assemble", () => assemble(rootFile, provider, options.sandboxRoot));
    const index = timed(2, "index", () => buildIndex(assembled.constructs));
    const env = timed(3, "types", () => buildTypeEnv(index));
    const typed = timed(4, "typecheck", () => typecheck(index, env));
    timed(5, "validate", () => validate(index));
    const bundle = timed(6, "serialize", () => serialize(typed, assembled.bundleId));
    return done(bundle, { durationMs: Date.now() - started });
  } catch (e) {
    if (isElabError(e)) return fail(e, { durationMs: Date.now() - started });
    throw e;
  }
}

/** Elaborate a single in-memory source text named `fileName`. */
export function elaborateSource(
  text: string,
  fileName = "contract.cov",
  options: Omit<ElaborateOptions, "provider"> = {}
): Outcome<Bundle, ElabError> {
  return elaborate(fileName, { ...options, provider: new InMemorySource({ [fileName]: text }) });
}
