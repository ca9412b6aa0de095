/**
 * Jest Test Setup
 *
 * Silences console and Nest logger output for the whole run.
 */

import type { ConsoleOverride } from "./utils/test-logging.types";

process.env.NODE_ENV = "test";

// Global log suppression for cleaner test output
const originalConsole: ConsoleOverride = {
  error: console.error,
  warn: console.warn,
  log: console.log,
  debug: console.debug,
};

const silent = (): void => undefined;

console.error = silent;
console.warn = silent;
console.log = silent;
console.debug = silent;

// The Nest ConsoleLogger writes to the process streams directly
const originalStdoutWrite = process.stdout.write.bind(process.stdout);
const originalStderrWrite = process.stderr.write.bind(process.stderr);

const discardWrite = ((
  _chunk: unknown,
  encoding?: BufferEncoding | ((err?: Error) => void),
  cb?: (err?: Error) => void
) => {
  if (typeof encoding === "function") encoding();
  else if (cb) cb();
  return true;
}) as typeof process.stdout.write;

process.stdout.write = discardWrite;
process.stderr.write = discardWrite;

afterAll(() => {
  console.error = originalConsole.error;
  console.warn = originalConsole.warn;
  console.log = originalConsole.log;
  console.debug = originalConsole.debug;

  process.stdout.write = originalStdoutWrite;
  process.stderr.write = originalStderrWrite;
});
