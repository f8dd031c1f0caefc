#!/usr/bin/env tsx

import { run } from "../src";

/**
 * Print the failure and exit non-zero. Errors reaching here are fatal:
 * a missing gh binary or an unparseable pull request listing.
 */
function fail(label: string, error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(label ? `${label} ${message}` : message);
  process.exit(1);
}

process.on("SIGINT", () => {
  process.exit(130);
});

process.on("uncaughtException", (err) => {
  fail("Uncaught exception:", err);
});

process.on("unhandledRejection", (reason) => {
  fail("Unhandled rejection:", reason);
});

(async () => {
  try {
    await run();
  } catch (error) {
    fail("", error);
  }
})();
