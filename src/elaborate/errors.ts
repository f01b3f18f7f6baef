/**
 * Elaboration failure. One per run: the first error of the first failing pass.
 */
export class ElabError extends Error {
  readonly pass: number;
  readonly construct_kind?: string;
  readonly construct_id?: string;
  readonly field?: string;
  readonly file: string;
  readonly line: number;

  constructor(init: {
    pass: number;
    construct_kind?: string;
    construct_id?: string;
    field?: string;
    file: string;
    line: number;
    message: string;
  }) {
    super(init.message);
    this.name = "ElabError";
    this.pass = init.pass;
    this.construct_kind = init.construct_kind;
    this.construct_id = init.construct_id;
    this.field = init.field;
    this.file = init.file;
    this.line = init.line;
  }

  /** Error record with every key present; unknown parts are `null`. */
  toJSON(): ElabErrorRecord {
    return {
      construct_id: this.construct_id ?? null,
      construct_kind: this.construct_kind ?? null,
      field: this.field ?? null,
      file: this.file,
      line: this.line,
      message: this.message,
      pass: this.pass,
    };
  }
}

export interface ElabErrorRecord {
  construct_id: string | null;
  construct_kind: string | null;
  field: string | null;
  file: string;
  line: number;
  message: string;
  pass: number;
}

/** Location and construct a pass reports against. */
export interface ErrorSite {
  kind?: string;
  id?: string;
  file: string;
  line: number;
}

export function elabError(pass: number, site: ErrorSite, field: string | undefined, message: string): ElabError {
  return new ElabError({
    pass,
    construct_kind: site.kind,
    construct_id: site.id,
    field,
    file: site.file,
    line: site.line,
    message,
  });
}

export function isElabError(e: unknown): e is ElabError {
  return e instanceof ElabError;
}

/** Error site for a declaration, at its header line unless `line` is given. */
export function siteOf(c: { tag: string; id: string; file: string; line: number }, line?: number): ErrorSite {
  return { kind: c.tag, id: c.id, file: c.file, line: line ?? c.line };
}
