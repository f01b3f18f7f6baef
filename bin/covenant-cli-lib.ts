// bin/covenant-cli-lib.ts
// Argument parsing, help text and command execution for the covenant CLI.
// Everything here takes its I/O as a parameter so it can be tested in process.

import * as fs from "fs";
import * as path from "path";
import { isLogLevel, createLogger, loggingTraceSink, type LogLevel } from "../src/adapters/logging";
import { loadConfig, validateConfig, type CovenantConfig } from "../src/core/config";
import { elaborate, FileSystemSource, type ElabError, type SourceProvider } from "../src/elaborate";
import { evaluate, evaluateFlow, formatEvalError, type EvalError } from "../src/eval";
import { BUNDLE_FORMAT_VERSION, BundleDecodeError, bundleDigest, decodeBundle, encodeBundle, encodeCanonical, type Bundle } from "../src/interchange";
import { formatDiagnostic, makeDiagnostic, passCode, type Diagnostic } from "../src/outcome";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliCommand = "elaborate" | "eval" | "check";

export const COMMANDS: readonly CliCommand[] = ["elaborate", "eval", "check"];

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  command?: CliCommand;
  file?: string;
  out?: string;
  digest?: boolean;
  facts?: string;
  flow?: string;
  persona?: string;
  config?: string;
  logLevel?: LogLevel;
  /** Problems found while parsing; any entry makes this a usage error. */
  errors: string[];
};

export type CliRequest =
  | { tag: "help" }
  | { tag: "version" }
  | { tag: "usage"; message: string }
  | { tag: "elaborate"; file: string; out?: string; digest: boolean }
  | { tag: "check"; file: string }
  | { tag: "eval"; bundle: string; facts: string; flow?: string; persona?: string };

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

function isCommand(word: string): word is CliCommand {
  return COMMANDS.some(c => c === word);
}

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { errors: [] };

  const value = (flag: string, i: number): string | undefined => {
    const v = args[i];
    if (v === undefined || v.startsWith("-")) {
      result.errors.push(`${flag} needs a value`);
      return undefined;
    }
    return v;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--digest") {
      result.digest = true;
    } else if (arg === "--out" || arg === "-o") {
      result.out = value(arg, ++i);
    } else if (arg === "--facts") {
      result.facts = value(arg, ++i);
    } else if (arg === "--flow") {
      result.flow = value(arg, ++i);
    } else if (arg === "--persona") {
      result.persona = value(arg, ++i);
    } else if (arg === "--config") {
      result.config = value(arg, ++i);
    } else if (arg === "--log-level") {
      const level = value(arg, ++i);
      if (level !== undefined) {
        if (isLogLevel(level)) result.logLevel = level;
        else result.errors.push(`unknown log level '${level}'`);
      }
    } else if (arg.startsWith("-")) {
      result.errors.push(`unknown option '${arg}'`);
    } else if (!result.command) {
      if (isCommand(arg)) result.command = arg;
      else result.errors.push(`unknown command '${arg}'`);
    } else if (!result.file) {
      result.file = arg;
    } else {
      result.errors.push(`unexpected argument '${arg}'`);
    }
  }

  return result;
}

/**
 * Decide what to run. Help and version win over everything else.
 */
export function buildRequest(args: CliArgs): CliRequest {
  if (args.help) return { tag: "help" };
  if (args.version) return { tag: "version" };
  if (args.errors.length > 0) return { tag: "usage", message: args.errors[0] };
  if (!args.command) return { tag: "usage", message: "missing command" };
  if (!args.file) return { tag: "usage", message: `${args.command} needs a file argument` };

  switch (args.command) {
    case "elaborate":
      return { tag: "elaborate", file: args.file, out: args.out, digest: args.digest === true };
    case "check":
      return { tag: "check", file: args.file };
    case "eval":
      if (!args.facts) return { tag: "usage", message: "eval needs --facts <facts.json>" };
      if (args.persona !== undefined && args.flow === undefined) {
        return { tag: "usage", message: "--persona is only meaningful with --flow" };
      }
      return { tag: "eval", bundle: args.file, facts: args.facts, flow: args.flow, persona: args.persona };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
covenant - elaborate and evaluate behavioral contracts

USAGE:
  covenant elaborate <file.cov> [--out bundle.json] [--digest]
  covenant check <file.cov>
  covenant eval <bundle.json> --facts <facts.json> [--flow <id> [--persona <p>]]

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -o, --out <file>                   Write the bundle to a file instead of stdout
  --digest                           Print the bundle digest (sha256) instead of the bundle
  --facts <file>                     Fact inputs, a JSON object keyed by fact id
  --flow <id>                        Run a flow after evaluating the rules
  --persona <p>                      Initiating persona recorded on the flow result
  --config <file>                    Configuration file (JSON)
  --log-level <level>                debug, info, warn, error or silent

EXIT CODES:
  0  success
  1  elaboration or evaluation failed
  2  usage error
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  let version = "0.1.0";
  const pkgPath = path.join(__dirname, "..", "package.json");
  if (fs.existsSync(pkgPath)) {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      version = pkg.version;
    }
  }
  return `covenant v${version} (bundle format ${BUNDLE_FORMAT_VERSION})`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export function elabDiagnostic(e: ElabError): Diagnostic {
  return makeDiagnostic(passCode(e.pass), { message: e.message }, { file: e.file, line: e.line });
}

export function evalDiagnostic(e: EvalError): Diagnostic {
  return e.tag === "malformed_bundle"
    ? makeDiagnostic("C1001", { message: e.message })
    : makeDiagnostic("C1000", { message: formatEvalError(e) });
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTION
// ═══════════════════════════════════════════════════════════════════════════════

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readFile(file: string): string;
  writeFile(file: string, text: string): void;
  /** Source files for elaboration. */
  provider: SourceProvider;
  env: NodeJS.ProcessEnv;
  cwd: string;
}

export function nodeIO(): CliIO {
  return {
    stdout: text => process.stdout.write(text),
    stderr: text => process.stderr.write(text),
    readFile: file => fs.readFileSync(file, "utf8"),
    writeFile: (file, text) => fs.writeFileSync(file, text, "utf8"),
    provider: new FileSystemSource(),
    env: process.env,
    cwd: process.cwd(),
  };
}

type Loaded<T> = { ok: true; value: T } | { ok: false; exit: number };

function readJson(io: CliIO, file: string): Loaded<unknown> {
  let text: string;
  try {
    text = io.readFile(file);
  } catch (e) {
    io.stderr(`error: cannot read ${file}: ${e instanceof Error ? e.message : String(e)}\n`);
    return { ok: false, exit: EXIT_FAILURE };
  }
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (e) {
    io.stderr(`error: ${file} is not valid JSON: ${e instanceof Error ? e.message : String(e)}\n`);
    return { ok: false, exit: EXIT_FAILURE };
  }
}

function loadBundle(io: CliIO, file: string): Loaded<Bundle> {
  let text: string;
  try {
    text = io.readFile(file);
  } catch (e) {
    io.stderr(`error: cannot read ${file}: ${e instanceof Error ? e.message : String(e)}\n`);
    return { ok: false, exit: EXIT_FAILURE };
  }
  try {
    return { ok: true, value: decodeBundle(text) };
  } catch (e) {
    if (!(e instanceof BundleDecodeError)) throw e;
    io.stderr(`${formatDiagnostic(makeDiagnostic("C1001", { message: e.message }))}\n`);
    return { ok: false, exit: EXIT_FAILURE };
  }
}

function configure(args: CliArgs, io: CliIO): Loaded<CovenantConfig> {
  let config: CovenantConfig;
  try {
    config = loadConfig({
      configFile: args.config,
      overrides: args.logLevel ? { log: { level: args.logLevel } } : undefined,
      env: io.env,
      cwd: io.cwd,
    });
  } catch (e) {
    io.stderr(`${formatDiagnostic(makeDiagnostic("C1100", { message: e instanceof Error ? e.message : String(e) }))}\n`);
    return { ok: false, exit: EXIT_USAGE };
  }

  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    io.stderr(`${formatDiagnostic(makeDiagnostic("W1100", { message: warning }))}\n`);
  }
  if (!validation.valid) {
    for (const error of validation.errors) {
      io.stderr(`${formatDiagnostic(makeDiagnostic("C1100", { message: error }))}\n`);
    }
    return { ok: false, exit: EXIT_USAGE };
  }
  return { ok: true, value: config };
}

/**
 * Run one CLI invocation and return its exit code. Command output goes to
 * `io.stdout`; diagnostics and logs to `io.stderr`.
 */
export function runCli(argv: string[], io: CliIO): number {
  const args = parseCliArgs(argv);
  const request = buildRequest(args);

  switch (request.tag) {
    case "help":
      io.stdout(`${getHelpText()}\n`);
      return EXIT_OK;
    case "version":
      io.stdout(`${getVersion()}\n`);
      return EXIT_OK;
    case "usage":
      io.stderr(`error: ${request.message}\n\n${getHelpText()}\n`);
      return EXIT_USAGE;
  }

  const loaded = configure(args, io);
  if (!loaded.ok) return loaded.exit;
  const config = loaded.value;
  const trace = loggingTraceSink(createLogger(config.log.level, "covenant", line => io.stderr(`${line}\n`)));

  switch (request.tag) {
    case "elaborate":
    case "check": {
      const result = elaborate(request.file, { provider: io.provider, sandboxRoot: config.elaborate.sandboxRoot, trace });
      if (result.tag === "Fail") {
        io.stderr(`${formatDiagnostic(elabDiagnostic(result.error))}\n`);
        return EXIT_FAILURE;
      }
      if (request.tag === "check") {
        io.stdout(`ok: ${request.file}\n`);
        return EXIT_OK;
      }
      const bundle = result.value;
      if (request.digest) {
        io.stdout(`${bundleDigest(bundle)}\n`);
        return EXIT_OK;
      }
      const text = `${encodeBundle(bundle, { indent: 2 })}\n`;
      if (request.out) io.writeFile(request.out, text);
      else io.stdout(text);
      return EXIT_OK;
    }

    case "eval": {
      const bundle = loadBundle(io, request.bundle);
      if (!bundle.ok) return bundle.exit;
      const facts = readJson(io, request.facts);
      if (!facts.ok) return facts.exit;
      const inputs = facts.value;
      if (typeof inputs !== "object" || inputs === null || Array.isArray(inputs)) {
        io.stderr(`error: ${request.facts} must contain a JSON object keyed by fact id\n`);
        return EXIT_FAILURE;
      }
      const factInputs: Record<string, unknown> = { ...inputs };

      if (request.flow === undefined) {
        const result = evaluate(bundle.value, factInputs, { trace });
        if (result.tag === "Fail") {
          io.stderr(`${formatDiagnostic(evalDiagnostic(result.error))}\n`);
          return EXIT_FAILURE;
        }
        io.stdout(`${encodeCanonical({ verdicts: result.value.verdicts }, { indent: 2 })}\n`);
        return EXIT_OK;
      }

      const result = evaluateFlow(bundle.value, factInputs, request.flow, {
        persona: request.persona,
        maxSteps: config.eval.maxFlowSteps,
        trace,
      });
      if (result.tag === "Fail") {
        io.stderr(`${formatDiagnostic(evalDiagnostic(result.error))}\n`);
        return EXIT_FAILURE;
      }
      const { flow, states, verdicts } = result.value;
      io.stdout(`${encodeCanonical({ flow, states, verdicts }, { indent: 2 })}\n`);
      return EXIT_OK;
    }
  }
}
