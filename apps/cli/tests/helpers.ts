import type { GhResult, GhRunner } from "@prcast/core";

import type { OutputSink } from "../src";

export interface CapturedOutput extends OutputSink {
  text(): string;
}

export function captureOutput(): CapturedOutput {
  const chunks: string[] = [];
  return {
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
    text: () => chunks.join(""),
  };
}

export interface FakeGh extends GhRunner {
  calls: string[][];
}

/**
 * gh stand-in: `pr list` answers with `listing`, every `pr comment` call
 * echoes a fake comment URL.
 */
export function createFakeGh(listing: string): FakeGh {
  const calls: string[][] = [];
  return {
    bin: "gh",
    calls,
    run(args): GhResult {
      calls.push([...args]);
      if (args[1] === "list") {
        return { stdout: Buffer.from(listing), status: 0 };
      }
      return {
        stdout: Buffer.from(`https://github.com/${args[4]}/pull/${args[2]}#issuecomment-1\n`),
        status: 0,
      };
    },
  };
}
