import {
  commentOnPullRequests,
  createGhRunner,
  extractPullRequestNumbers,
  formatConfirmPrompt,
  isConfirmation,
  listPullRequests,
  loadConfig,
  type GhRunner,
  type PrcastConfig,
} from "@prcast/core";
import { createLogger, type Logger } from "@prcast/shared";
import ora from "ora";

import { askLine } from "../prompt";
import { green } from "../utils/color";

/** Anything with a string `write`, e.g. process.stdout. */
export interface OutputSink {
  write(chunk: string): unknown;
}

/** Overrides for collaborators the action would otherwise build itself. */
export interface BroadcastDeps {
  config?: PrcastConfig;
  logger?: Logger;
  gh?: GhRunner;
  ask?: (question: string) => Promise<string>;
  stdout?: OutputSink;
  /** Show the listing spinner on stderr. Default: true */
  spinner?: boolean;
}

export interface BroadcastResult {
  pullRequests: number[];
  confirmed: boolean;
  /** Concatenated gh output from every comment call */
  output: string;
}

/**
 * List the repository's pull requests, confirm with the user, then post
 * the comment file on each one.
 */
export async function broadcastAction(
  repo: string,
  commentFile: string,
  deps: BroadcastDeps = {}
): Promise<BroadcastResult> {
  const config = deps.config ?? (await loadConfig());
  const logger =
    deps.logger ?? createLogger({ level: config.log_level, stream: "stderr" });
  const gh = deps.gh ?? createGhRunner({ bin: config.gh_path, logger });
  const ask = deps.ask ?? askLine;
  const stdout = deps.stdout ?? process.stdout;

  const spinner = ora({
    text: `Listing pull requests in ${repo}...`,
    stream: process.stderr,
    isSilent: deps.spinner === false,
  }).start();

  let pullRequests: number[];
  try {
    pullRequests = extractPullRequestNumbers(listPullRequests(gh, repo));
  } catch (error) {
    spinner.fail(`Could not list pull requests in ${repo}`);
    throw error;
  }
  spinner.stop();
  logger.info("Listed pull requests", { repo, count: pullRequests.length });

  const answer = await ask(
    formatConfirmPrompt(pullRequests.length, repo, commentFile)
  );
  if (!isConfirmation(answer)) {
    logger.debug("Not confirmed, nothing posted", { answer });
    return { pullRequests, confirmed: false, output: "" };
  }

  const output = commentOnPullRequests(gh, pullRequests, repo, commentFile);
  stdout.write(output);
  stdout.write(`${green("Done.")}\n`);
  logger.info("Commented on pull requests", {
    repo,
    count: pullRequests.length,
  });

  return { pullRequests, confirmed: true, output };
}
