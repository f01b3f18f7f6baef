export { elaborate, elaborateSource, type ElaborateOptions } from "./elaborate";
export { ElabError, isElabError, type ElabErrorRecord } from "./errors";
export { FileSystemSource, InMemorySource, type SourceProvider } from "./source";
export { SerializeInvariantError } from "./serialize";
