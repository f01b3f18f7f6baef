import * as fs from "fs";
import * as path from "path";

/**
 * File access used by import resolution. Paths are opaque to the elaborator;
 * only `canonical` results are compared.
 */
export interface SourceProvider {
  /** Source text of `file`; throws when it cannot be read. */
  read(file: string): string;
  /** Path of `importPath` written in a file that lives in `baseDir`. */
  resolve(baseDir: string, importPath: string): string;
  /** Stable identity of a path; throws when the path does not exist. */
  canonical(file: string): string;
  /** Directory part of a path. */
  dirname(file: string): string;
  /** Path of `file` relative to `dir`, with `/` separators. */
  relative(dir: string, file: string): string;
}

// =========================================================================
// File system
// =========================================================================

export class FileSystemSource implements SourceProvider {
  read(file: string): string {
    return fs.readFileSync(file, "utf8");
  }

  resolve(baseDir: string, importPath: string): string {
    return path.resolve(baseDir, importPath);
  }

  canonical(file: string): string {
    return fs.realpathSync(file);
  }

  dirname(file: string): string {
    return path.dirname(file);
  }

  relative(dir: string, file: string): string {
    return path.relative(dir, file).split(path.sep).join("/");
  }
}

// =========================================================================
// In memory
// =========================================================================

/**
 * Files held in a map keyed by POSIX path. Relative keys are taken from `/`.
 */
export class InMemorySource implements SourceProvider {
  private readonly files = new Map<string, string>();

  constructor(files: Record<string, string> = {}) {
    for (const [name, text] of Object.entries(files)) {
      this.files.set(InMemorySource.normalize(name), text);
    }
  }

  static normalize(file: string): string {
    return path.posix.resolve("/", file);
  }

  set(file: string, text: string): this {
    this.files.set(InMemorySource.normalize(file), text);
    return this;
  }

  read(file: string): string {
    const text = this.files.get(InMemorySource.normalize(file));
    if (text === undefined) throw new Error(`no such file: ${file}`);
    return text;
  }

  resolve(baseDir: string, importPath: string): string {
    return path.posix.resolve(InMemorySource.normalize(baseDir), importPath);
  }

  canonical(file: string): string {
    const normal = InMemorySource.normalize(file);
    if (!this.files.has(normal) && !this.isDirectory(normal)) {
      throw new Error(`no such file: ${file}`);
    }
    return normal;
  }

  dirname(file: string): string {
    return path.posix.dirname(InMemorySource.normalize(file));
  }

  relative(dir: string, file: string): string {
    return path.posix.relative(InMemorySource.normalize(dir), InMemorySource.normalize(file));
  }

  private isDirectory(normal: string): boolean {
    const prefix = normal.endsWith("/") ? normal : normal + "/";
    for (const name of this.files.keys()) {
      if (name.startsWith(prefix)) return true;
    }
    return false;
  }
}

/** Whether canonical `file` lies at or below canonical directory `root`. */
export function isWithin(root: string, file: string, provider: SourceProvider): boolean {
  const rel = provider.relative(root, file);
  return rel !== "" && !rel.startsWith("../") && rel !== ".." && !path.isAbsolute(rel);
}
