#!/usr/bin/env npx tsx
// bin/covenant.ts
// Command-line entry point: elaborate, check and evaluate contracts.
//
// Run:  npx tsx bin/covenant.ts <command> [options] <file>

import { nodeIO, runCli } from "./covenant-cli-lib";

process.exitCode = runCli(process.argv.slice(2), nodeIO());
