/**
 * gh CLI runner
 *
 * Every interaction with GitHub goes through the `gh` binary. Calls block
 * until the subprocess exits; there is no timeout. Output beyond
 * GH_MAX_BUFFER is cut off and reported like any other failed call.
 */

import { NotFoundError } from "@outfitter/contracts";
import { spawnSync } from "node:child_process";

import { silentLogger, type Logger } from "@prcast/shared";

export const GH_MAX_BUFFER = 50 * 1024 * 1024;

/** Captured output of one gh invocation. */
export interface GhResult {
  stdout: Buffer;
  /** Exit code, or null when the process was killed by a signal */
  status: number | null;
}

/** Port for running gh. The CLI uses `createGhRunner`; tests supply a fake. */
export interface GhRunner {
  readonly bin: string;
  run(args: readonly string[]): GhResult;
}

export interface GhRunnerOptions {
  /** Executable name or path. Default: "gh" */
  bin?: string;
  logger?: Logger;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export function createGhRunner(options: GhRunnerOptions = {}): GhRunner {
  const bin = options.bin ?? "gh";
  const logger = (options.logger ?? silentLogger).child({ component: "gh" });

  return {
    bin,
    run(args) {
      logger.debug("Running gh", { args });

      // stderr is inherited so gh's own diagnostics reach the user.
      const result = spawnSync(bin, args, {
        stdio: ["ignore", "pipe", "inherit"],
        maxBuffer: GH_MAX_BUFFER,
      });

      if (result.error) {
        const code = isErrnoException(result.error)
          ? result.error.code
          : undefined;
        if (code === "ENOENT") {
          throw new NotFoundError({
            message: `'${bin}' not found. Install the GitHub CLI (https://cli.github.com) or set PRCAST_GH_PATH.`,
            resourceType: "executable",
            resourceId: bin,
          });
        }
        if (code !== "ENOBUFS") {
          throw result.error;
        }
        logger.warn("gh output exceeded the buffer limit and was truncated", {
          args,
          limit: GH_MAX_BUFFER,
        });
        return { stdout: result.stdout, status: null };
      }

      if (result.status !== 0) {
        logger.debug("gh exited with non-zero status", {
          args,
          status: result.status,
          signal: result.signal,
        });
      }

      return { stdout: result.stdout, status: result.status };
    },
  };
}
