// test/cli/covenant.spec.ts
// CLI argument handling and command execution, with in-memory I/O

import { describe, it, expect } from "vitest";
import { buildRequest, parseCliArgs, runCli, EXIT_FAILURE, EXIT_OK, EXIT_USAGE, type CliIO } from "../../bin/covenant-cli-lib";
import { InMemorySource } from "../../src/elaborate";
import { decodeBundle, encodeBundle } from "../../src/interchange";
import { invoiceBundle } from "../helpers/contracts";

type TestIO = CliIO & { out: string[]; err: string[]; written: Map<string, string> };

function testIO(files: Record<string, string> = {}, env: NodeJS.ProcessEnv = {}): TestIO {
  const out: string[] = [];
  const err: string[] = [];
  const written = new Map<string, string>();
  return {
    out,
    err,
    written,
    stdout: text => out.push(text),
    stderr: text => err.push(text),
    readFile: file => {
      const text = files[file];
      if (text === undefined) throw new Error(`no such file ${file}`);
      return text;
    },
    writeFile: (file, text) => written.set(file, text),
    provider: new InMemorySource(files),
    env,
    cwd: "/w",
  };
}

const evalFiles = (facts: string) => ({
  "/w/bundle.json": encodeBundle(invoiceBundle()),
  "/w/facts.json": facts,
});

describe("parseCliArgs", () => {
  it("reads a command, a file and options", () => {
    expect(parseCliArgs(["eval", "b.json", "--facts", "f.json", "--flow", "main"])).toEqual({
      command: "eval",
      file: "b.json",
      facts: "f.json",
      flow: "main",
      errors: [],
    });
  });

  it("collects problems instead of throwing", () => {
    expect(parseCliArgs(["run", "--log-level", "loud", "--out"]).errors).toEqual([
      "unknown command 'run'",
      "unknown log level 'loud'",
      "--out needs a value",
    ]);
  });
});

describe("buildRequest", () => {
  it("needs facts to evaluate", () => {
    expect(buildRequest(parseCliArgs(["eval", "b.json"]))).toEqual({ tag: "usage", message: "eval needs --facts <facts.json>" });
  });

  it("takes a persona only with a flow", () => {
    expect(buildRequest(parseCliArgs(["eval", "b.json", "--facts", "f.json", "--persona", "clerk"]))).toEqual({
      tag: "usage",
      message: "--persona is only meaningful with --flow",
    });
  });

  it("lets help win over errors", () => {
    expect(buildRequest(parseCliArgs(["--bogus", "--help"]))).toEqual({ tag: "help" });
  });
});

describe("runCli", () => {
  it("prints help", () => {
    const io = testIO();
    expect(runCli(["--help"], io)).toBe(EXIT_OK);
    expect(io.out[0].startsWith("covenant - elaborate and evaluate behavioral contracts\n")).toBe(true);
  });

  it("reports the package version", () => {
    const io = testIO();
    expect(runCli(["--version"], io)).toBe(EXIT_OK);
    expect(io.out[0]).toMatch(/^covenant v\d+\.\d+\.\d+ \(bundle format [^)]+\)\n$/);
  });

  it("exits with a usage error and the help text", () => {
    const io = testIO();
    expect(runCli([], io)).toBe(EXIT_USAGE);
    expect(io.err[0].startsWith("error: missing command\n\ncovenant - ")).toBe(true);
  });

  it("checks a contract", () => {
    const io = testIO({ "/w/ok.cov": "persona clerk\n" });
    expect(runCli(["check", "/w/ok.cov"], io)).toBe(EXIT_OK);
    expect(io.out).toEqual(["ok: /w/ok.cov\n"]);
  });

  it("reports elaboration errors as diagnostics", () => {
    const io = testIO({ "/w/bad.cov": "persona" });
    expect(runCli(["check", "/w/bad.cov"], io)).toBe(EXIT_FAILURE);
    expect(io.err).toEqual(["bad.cov:1: error[C0000]: expected identifier, got end of input\n"]);
  });

  it("writes the bundle to a file", () => {
    const io = testIO({ "/w/ok.cov": "persona clerk\n" });
    expect(runCli(["elaborate", "/w/ok.cov", "--out", "/w/ok.json"], io)).toBe(EXIT_OK);
    expect(io.out).toEqual([]);
    const bundle = decodeBundle(io.written.get("/w/ok.json") ?? "");
    expect(bundle.id).toBe("ok");
    expect(bundle.constructs.map(c => c.id)).toEqual(["clerk"]);
  });

  it("prints the bundle digest", () => {
    const io = testIO({ "/w/ok.cov": "persona clerk\n" });
    expect(runCli(["elaborate", "/w/ok.cov", "--digest"], io)).toBe(EXIT_OK);
    expect(io.out[0]).toMatch(/^sha256:[0-9a-f]{64}\n$/);
  });

  it("evaluates verdicts", () => {
    const io = testIO(evalFiles('{"amount": 1200}'));
    expect(runCli(["eval", "/w/bundle.json", "--facts", "/w/facts.json"], io)).toBe(EXIT_OK);
    expect(io.err).toEqual([]);
    const output = JSON.parse(io.out[0]);
    expect(output.verdicts.map((v: { type: string }) => v.type)).toEqual(["WithinLimit"]);
  });

  it("runs a flow and prints the final entity states", () => {
    const io = testIO(evalFiles('{"amount": 1200}'));
    const code = runCli(["eval", "/w/bundle.json", "--facts", "/w/facts.json", "--flow", "invoice_flow", "--persona", "clerk"], io);
    expect(code).toBe(EXIT_OK);
    const output = JSON.parse(io.out[0]);
    expect(output.flow.outcome).toBe("approved");
    expect(output.flow.initiating_persona).toBe("clerk");
    expect(output.states).toEqual([
      { entity_id: "Invoice", instance_id: "_default", state: "approved" },
      { entity_id: "Shipment", instance_id: "_default", state: "pending" },
    ]);
  });

  it("reports evaluation errors", () => {
    const io = testIO(evalFiles("{}"));
    expect(runCli(["eval", "/w/bundle.json", "--facts", "/w/facts.json"], io)).toBe(EXIT_FAILURE);
    expect(io.err).toEqual(["error[C1000]: missing required fact: amount\n"]);
  });

  it("reports a malformed bundle", () => {
    const io = testIO({ "/w/bundle.json": "[]", "/w/facts.json": "{}" });
    expect(runCli(["eval", "/w/bundle.json", "--facts", "/w/facts.json"], io)).toBe(EXIT_FAILURE);
    expect(io.err).toEqual(["error[C1001]: Malformed bundle: $: expected an object\n"]);
  });

  it("requires fact inputs to be an object", () => {
    const io = testIO(evalFiles("[1]"));
    expect(runCli(["eval", "/w/bundle.json", "--facts", "/w/facts.json"], io)).toBe(EXIT_FAILURE);
    expect(io.err).toEqual(["error: /w/facts.json must contain a JSON object keyed by fact id\n"]);
  });

  it("reports unreadable files", () => {
    const io = testIO(evalFiles("{}"));
    expect(runCli(["eval", "/w/bundle.json", "--facts", "/w/none.json"], io)).toBe(EXIT_FAILURE);
    expect(io.err).toEqual(["error: cannot read /w/none.json: no such file /w/none.json\n"]);
  });

  it("logs evaluation events at the requested level", () => {
    const io = testIO(evalFiles('{"amount": 1200}'));
    runCli(["eval", "/w/bundle.json", "--facts", "/w/facts.json", "--log-level", "info"], io);
    expect(io.err).toEqual([
      '[covenant] info: assembled 2 facts {"defaulted":["approved_limit"]}\n',
      '[covenant] info: verdict WithinLimit produced by within_limit {"stratum":0}\n',
    ]);
  });

  it("rejects invalid configuration", () => {
    const io = testIO({ "/w/ok.cov": "persona clerk\n" }, { COVENANT_LOG_LEVEL: "loud" });
    expect(runCli(["check", "/w/ok.cov"], io)).toBe(EXIT_USAGE);
    expect(io.err).toEqual(["error[C1100]: Invalid configuration: COVENANT_LOG_LEVEL: unknown log level 'loud'\n"]);

    const zero = testIO({ "/w/ok.cov": "persona clerk\n" }, { COVENANT_MAX_FLOW_STEPS: "0" });
    expect(runCli(["check", "/w/ok.cov"], zero)).toBe(EXIT_USAGE);
    expect(zero.err).toEqual(["error[C1100]: Invalid configuration: eval.maxFlowSteps must be a positive integer, got 0\n"]);
  });
});
