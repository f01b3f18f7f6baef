import { describe, it, expect } from "vitest";
import { elaborate, InMemorySource, type ElabError } from "../../src/elaborate";
import { bundleOf, elabFailure } from "../helpers/contracts";

function filesFailure(files: Record<string, string>, root: string, sandboxRoot?: string): ElabError {
  const result = elaborate(root, { provider: new InMemorySource(files), sandboxRoot });
  if (result.tag === "Done") throw new Error("expected elaboration to fail");
  return result.error;
}

const GO = `
persona p
entity E { states: [a, b, c], initial: a, transitions: [(a, b), (a, c)] }
operation go { allowed_personas: [p], precondition: true, effects: [(E, a -> b)], outcomes: [ok] }
`;

describe("pass 0: parsing", () => {
  it("fails with a located syntax error", () => {
    expect(elabFailure("persona").toJSON()).toEqual({
      construct_id: null,
      construct_kind: null,
      field: null,
      file: "contract.cov",
      line: 1,
      message: "expected identifier, got end of input",
      pass: 0,
    });
  });
});

describe("pass 1: imports", () => {
  it("reports an import that does not resolve", () => {
    const err = filesFailure({ "/c/main.cov": "import \"nope.cov\"" }, "/c/main.cov");
    expect(err.toJSON()).toEqual({
      construct_id: null,
      construct_kind: null,
      field: "import",
      file: "main.cov",
      line: 1,
      message: "import resolution failed: cannot resolve path 'nope.cov'",
      pass: 1,
    });
  });

  it("keeps imports inside the contract root", () => {
    const err = filesFailure(
      { "/c/app/main.cov": "import \"../other.cov\"", "/c/other.cov": "persona p" },
      "/c/app/main.cov"
    );
    expect(err.message).toBe("import '../other.cov' escapes the contract root directory");
  });

  it("honours an explicit sandbox root", () => {
    const result = elaborate("/c/app/main.cov", {
      provider: new InMemorySource({ "/c/app/main.cov": "import \"../other.cov\"", "/c/other.cov": "persona p" }),
      sandboxRoot: "/c",
    });
    expect(result.tag).toBe("Done");
  });

  it("names the files of an import cycle", () => {
    const err = filesFailure(
      { "/c/a.cov": "import \"b.cov\"\npersona a", "/c/b.cov": "persona b\nimport \"a.cov\"" },
      "/c/a.cov"
    );
    expect(err.message).toBe("import cycle detected: a.cov → b.cov → a.cov");
    expect(err.file).toBe("b.cov");
    expect(err.line).toBe(2);
  });

  it("forbids imports in type libraries", () => {
    const err = filesFailure(
      {
        "/c/main.cov": "import \"lib.cov\"\npersona q",
        "/c/lib.cov": "import \"x.cov\"\ntype T { a: Bool }",
        "/c/x.cov": "persona p",
      },
      "/c/main.cov"
    );
    expect(err.message).toBe("type library 'lib.cov' may not import other files; type libraries must be self-contained");
    expect(err.file).toBe("lib.cov");
  });

  it("rejects the same id declared in two files", () => {
    const err = filesFailure(
      { "/c/main.cov": "import \"other.cov\"\npersona p", "/c/other.cov": "persona p" },
      "/c/main.cov"
    );
    expect(err.message).toBe("duplicate Persona id 'p': first declared in other.cov");
    expect(err.file).toBe("main.cov");
    expect(err.line).toBe(2);
  });

  it("reports an unreadable root file", () => {
    const err = filesFailure({}, "/c/missing.cov");
    expect(err.message).toBe("cannot read file '/c/missing.cov': no such file: /c/missing.cov");
    expect(err.pass).toBe(1);
  });

  it("reports a contract root that does not exist", () => {
    const err = filesFailure({ "/c/app/main.cov": "persona p" }, "/c/app/main.cov", "/nowhere");
    expect(err.toJSON()).toEqual({
      construct_id: null,
      construct_kind: null,
      field: "import",
      file: "main.cov",
      line: 0,
      message: "cannot resolve contract root '/nowhere': no such file: /nowhere",
      pass: 1,
    });
  });
});

describe("pass 2: index", () => {
  it("rejects duplicate ids within a kind", () => {
    expect(elabFailure("persona a\npersona a").toJSON()).toEqual({
      construct_id: "a",
      construct_kind: "Persona",
      field: "id",
      file: "contract.cov",
      line: 2,
      message: "duplicate Persona id 'a': first declared at line 1",
      pass: 2,
    });
  });

  it("lets different kinds share an id", () => {
    expect(bundleOf("persona x\nentity x { states: [a], initial: a }").constructs).toHaveLength(2);
  });
});

describe("pass 3: type environment", () => {
  it("detects alias cycles", () => {
    const err = elabFailure("type A { b: B }\ntype B { a: A }");
    expect(err.message).toBe("TypeDecl cycle detected: A → B → A");
    expect(err.pass).toBe(3);
    expect(err.construct_id).toBe("B");
    expect(err.field).toBe("type.fields.a");
    expect(err.line).toBe(2);
  });

  it("rejects references to undeclared types", () => {
    const err = elabFailure("type A { x: Nope }");
    expect(err.message).toBe("unknown type reference 'Nope'");
    expect(err.pass).toBe(3);
  });

  it("checks type parameters", () => {
    expect(elabFailure("type A { n: Int(min: 5, max: 1) }").message).toBe("type error: Int min 5 exceeds max 1");
    expect(elabFailure("type A { m: Money(currency: usd) }").message).toBe(
      "type error: currency 'usd' must be a three-letter ISO 4217 code"
    );
  });
});

describe("pass 4: type checking", () => {
  const rule = (when: string) =>
    `rule r { stratum: 0, when: ${when}, produce: verdict V { payload: Bool = true } }`;

  it("rejects references to undeclared facts", () => {
    const err = elabFailure(rule("y > 1"));
    expect(err.message).toBe("unresolved fact reference: 'y' is not declared in this contract");
    expect(err.pass).toBe(4);
    expect(err.construct_kind).toBe("Rule");
    expect(err.field).toBe("body.when");
  });

  it("rejects comparisons across unrelated types", () => {
    const err = elabFailure(
      `fact n { type: Int, source: "s.n" }\nfact t { type: Text(max_length: 5), source: "s.t" }\n${rule("n = t")}`
    );
    expect(err.message).toBe("type error: cannot compare Int with Text(max_length: 5)");
  });

  it("rejects ordering on Bool", () => {
    const err = elabFailure(`fact f { type: Bool, source: "s.f" }\n${rule("f < true")}`);
    expect(err.message).toBe("type error: operator '<' not defined for Bool; Bool supports only = and ≠");
  });

  it("only multiplies by literals", () => {
    const err = elabFailure(
      `fact a { type: Int(0, 10), source: "s.a" }\nfact b { type: Int(0, 10), source: "s.b" }\n${rule("a * b > 1")}`
    );
    expect(err.message).toBe(
      "type error: variable × variable multiplication is not permitted in PredicateExpression; only variable × literal_numeric is allowed"
    );
  });

  it("checks payload values against the declared payload type", () => {
    const err = elabFailure(`
fact n { type: Int(min: 0, max: 100), source: "s.n" }
rule r { stratum: 0, when: n > 1, produce: verdict V { payload: Int(min: 0, max: 10) = n } }`);
    expect(err.message).toBe(
      "type error: value type Int(min: 0, max: 100) is not contained in declared verdict payload type Int(min: 0, max: 10)"
    );
    expect(err.field).toBe("body.produce.payload");
  });

  it("requires quantifier domains to be lists", () => {
    const err = elabFailure(`fact n { type: Int, source: "s.n" }\n${rule("forall v in n . v > 1")}`);
    expect(err.message).toBe("type error: quantifier domain 'n' has type Int; domain must be List-typed");
  });

  it("rejects structured sources that are not declared", () => {
    const err = elabFailure("fact x { type: Bool, source: crm { path: \"a\" } }");
    expect(err.message).toBe("fact 'x' references undeclared source 'crm'");
    expect(err.field).toBe("source");
  });

  it("checks defaults against the fact type", () => {
    expect(elabFailure("fact x { type: Bool, source: \"s.x\", default: 3 }").message).toBe(
      "type error: default value 3 does not match declared type Bool"
    );
    expect(elabFailure("fact x { type: Int(0, 10), source: \"s.x\", default: 11 }").message).toBe(
      "type error: default value 11 is out of range for Int(min: 0, max: 10)"
    );
  });

  it("rejects unknown types in fact declarations", () => {
    const err = elabFailure("fact x { type: Nope, source: \"s.x\" }");
    expect(err.message).toBe("unknown type reference 'Nope'");
    expect(err.pass).toBe(4);
  });
});

describe("pass 5: structural validation", () => {
  const verdict = (id: string, stratum: number, when: string, produces: string) =>
    `rule ${id} { stratum: ${stratum}, when: ${when}, produce: verdict ${produces} { payload: Bool = true } }`;

  it("enforces strict stratification", () => {
    const err = elabFailure(`${verdict("a", 0, "true", "A")}\n${verdict("b", 0, "verdict_present(A)", "B")}`);
    expect(err.message).toBe(
      "stratum violation: rule 'b' at stratum 0 references verdict 'A' produced by rule 'a' at stratum 0; verdict_refs must reference strata strictly less than the referencing rule's stratum"
    );
    expect(err.pass).toBe(5);
    expect(err.line).toBe(2);
  });

  it("accepts references to lower strata", () => {
    expect(() => bundleOf(`${verdict("a", 0, "true", "A")}\n${verdict("b", 1, "verdict_present(A)", "B")}`)).not.toThrow();
  });

  it("allows one producer per verdict type", () => {
    const err = elabFailure(`${verdict("r1", 0, "true", "V")}\n${verdict("r2", 0, "true", "V")}`);
    expect(err.message).toBe(
      "VerdictType 'V' is already produced by rule 'r1'. Each VerdictType may be produced by at most one rule."
    );
  });

  it("requires verdict references to have a producer", () => {
    const err = elabFailure(
      "persona p\noperation o { allowed_personas: [p], precondition: verdict_present(X), outcomes: [ok] }"
    );
    expect(err.message).toBe("unresolved VerdictType reference: 'X' is not produced by any rule in this contract");
    expect(err.field).toBe("precondition");
  });

  it("requires effects to be declared transitions", () => {
    const err = elabFailure(`${GO}
operation back { allowed_personas: [p], precondition: true, effects: [(E, b -> a)], outcomes: [done] }`);
    expect(err.message).toBe(
      "effect (E, b, a) is not a declared transition in entity E; declared transitions are: [(a, b), (a, c)]"
    );
  });

  it("requires outcome labels on multi-outcome effects", () => {
    const err = elabFailure(`${GO}
operation pick { allowed_personas: [p], precondition: true, effects: [(E, a -> b, yes), (E, a -> c)], outcomes: [yes, no] }`);
    expect(err.message).toBe(
      "effect (E, a, c) is missing an outcome label; multi-outcome operations require every effect to specify which outcome it belongs to"
    );
  });

  it("requires allowed personas", () => {
    const err = elabFailure("operation o { allowed_personas: [], precondition: true, outcomes: [ok] }");
    expect(err.message).toBe(
      "allowed_personas must be non-empty; an Operation with no allowed personas can never be invoked"
    );
  });

  it("checks the initial state", () => {
    expect(elabFailure("entity E { states: [a, b], initial: c }").message).toBe(
      "initial state 'c' is not declared in states: [a, b]"
    );
  });

  it("checks transition endpoints", () => {
    expect(elabFailure("entity E { states: [a, b], initial: a, transitions: [(a, z)] }").toJSON()).toEqual({
      construct_id: "E",
      construct_kind: "Entity",
      field: "transitions",
      file: "contract.cov",
      line: 1,
      message: "transition endpoint 'z' is not declared in states: [a, b]",
      pass: 5,
    });
  });

  it("rejects cycles in the entity hierarchy", () => {
    const err = elabFailure("entity A { states: [s], initial: s, parent: B }\nentity B { states: [s], initial: s, parent: A }");
    expect(err.toJSON()).toEqual({
      construct_id: "B",
      construct_kind: "Entity",
      field: "parent",
      file: "contract.cov",
      line: 2,
      message: "entity hierarchy cycle detected: A → B → A",
      pass: 5,
    });
  });

  it("keeps outcomes and the error contract apart", () => {
    const err = elabFailure(
      "persona p\noperation o { allowed_personas: [p], precondition: true, outcomes: [ok], error_contract: [denied, ok] }"
    );
    expect(err.toJSON()).toEqual({
      construct_id: "o",
      construct_kind: "Operation",
      field: "outcomes",
      file: "contract.cov",
      line: 2,
      message: "outcome 'ok' conflicts with error_contract; outcomes and error_contract must be disjoint",
      pass: 5,
    });
  });

  it("checks the fields each protocol needs", () => {
    const err = elabFailure("source s { protocol: http }");
    expect(err.message).toBe("source 's' with protocol 'http' is missing required field 'base_url'");
    expect(err.field).toBe("protocol");
    expect(elabFailure("source s { protocol: ftp }").message).toBe("unknown protocol tag 'ftp'");
    expect(() => bundleOf("source s { protocol: x_acme }")).not.toThrow();
  });

  it("requires every operation outcome to be routed", () => {
    const err = elabFailure(`${GO}
operation decide { allowed_personas: [p], precondition: true, effects: [(E, a -> b, yes), (E, a -> c, no)], outcomes: [yes, no] }
flow f {
  entry: s
  steps: {
    s: OperationStep { op: decide, persona: p, outcomes: { yes: Terminal(done) }, on_failure: Terminate(outcome: failed) }
  }
}`);
    expect(err.message).toBe("OperationStep 's' does not route outcome 'no' of operation 'decide'");
    expect(err.field).toBe("steps.s.outcomes");
    expect(err.construct_kind).toBe("Flow");
  });

  it("requires a failure handler on operation steps", () => {
    const err = elabFailure(`${GO}
flow f { entry: s, steps: { s: OperationStep { op: go, persona: p, outcomes: { ok: Terminal(done) } } } }`);
    expect(err.toJSON()).toEqual({
      construct_id: "f",
      construct_kind: "Flow",
      field: "steps.s.on_failure",
      file: "contract.cov",
      line: 6,
      message: "OperationStep 's' must declare a FailureHandler",
      pass: 5,
    });
  });

  it("requires a parallel join to declare a route", () => {
    const err = elabFailure(`persona p
flow f { entry: par, steps: { par: ParallelStep { branches: [], join: JoinPolicy { } } } }`);
    expect(err.message).toBe("ParallelStep 'par' join must declare at least one of on_all_success, on_any_failure, on_all_complete");
    expect(err.field).toBe("steps.par.join");
    expect(err.line).toBe(2);
  });

  it("requires step personas to be declared", () => {
    const err = elabFailure(`${GO}
flow f { entry: s, steps: { s: OperationStep { op: go, persona: q, outcomes: { ok: Terminal(done) }, on_failure: Terminate(failed) } } }`);
    expect(err.message).toBe("undeclared persona 'q'");
    expect(err.field).toBe("steps.s.persona");
  });

  it("rejects cyclic step graphs", () => {
    const err = elabFailure(`persona p
flow f { entry: h1, steps: {
  h1: HandoffStep { from_persona: p, to_persona: p, next: h2 }
  h2: HandoffStep { from_persona: p, to_persona: p, next: h1 }
} }`);
    expect(err.message).toBe("flow step graph is not acyclic: cycle detected involving steps [h1, h2]");
    expect(err.field).toBe("steps");
  });

  it("keeps parallel branches off each other's entities", () => {
    const branch = (id: string) =>
      `Branch { id: ${id}, entry: s, steps: { s: OperationStep { op: go, persona: p, outcomes: { ok: Terminal(done) }, on_failure: Terminate(failed) } } }`;
    const err = elabFailure(`${GO}
flow f { entry: par, steps: { par: ParallelStep {
  branches: [${branch("x")}, ${branch("y")}]
  join: JoinPolicy { on_all_success: Terminal(done), on_any_failure: Terminate(failed) }
} } }`);
    expect(err.message).toBe(
      "parallel branches 'x' and 'y' both declare effects on entity 'E'; parallel branch entity effect sets must be disjoint"
    );
    expect(err.field).toBe("steps.par.branches");
  });

  it("rejects flows that call each other", () => {
    const call = (id: string, target: string) =>
      `flow ${id} { entry: s, steps: { s: SubFlowStep { flow: ${target}, persona: p, on_success: Terminal(done), on_failure: Terminate(failed) } } }`;
    const err = elabFailure(`persona p\n${call("f", "g")}\n${call("g", "f")}`);
    expect(err.message).toBe("flow reference cycle detected: f → g → f");
    expect(err.construct_id).toBe("g");
    expect(err.field).toBe("steps.s.flow");
    expect(err.line).toBe(3);
  });
});
