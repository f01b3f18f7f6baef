// test/helpers/contracts.ts
// Elaboration shortcuts shared by the evaluator, interchange and CLI tests.

import * as path from "path";
import { elaborate, elaborateSource, type ElabError } from "../../src/elaborate";
import type { Bundle } from "../../src/interchange";
import { unwrap } from "../../src/outcome";

export const FIXTURES = path.join(__dirname, "..", "fixtures");
export const INVOICE_FILE = path.join(FIXTURES, "invoice.cov");

const describeElab = (e: ElabError) => `${e.file}:${e.line}: ${e.message}`;

/** The invoice fixture, elaborated from disk. */
export function invoiceBundle(): Bundle {
  return unwrap(elaborate(INVOICE_FILE), describeElab);
}

/** Elaborate a single source text; throws when elaboration fails. */
export function bundleOf(text: string): Bundle {
  return unwrap(elaborateSource(text), describeElab);
}

/** The error elaborating `text` fails with; throws when it succeeds. */
export function elabFailure(text: string): ElabError {
  const result = elaborateSource(text);
  if (result.tag === "Done") throw new Error("expected elaboration to fail");
  return result.error;
}
