import type { GhResult, GhRunner } from "../src";

export interface FakeGh extends GhRunner {
  /** Every argument vector passed to `run`, in call order */
  calls: string[][];
}

type Responder = (args: readonly string[]) => string | GhResult;

/**
 * In-process stand-in for the gh CLI. Records calls and answers each one
 * through `respond`; a string answer means exit status 0.
 */
export function createFakeGh(respond: Responder = () => ""): FakeGh {
  const calls: string[][] = [];
  return {
    bin: "gh",
    calls,
    run(args) {
      calls.push([...args]);
      const answer = respond(args);
      if (typeof answer === "string") {
        return { stdout: Buffer.from(answer, "utf8"), status: 0 };
      }
      return answer;
    },
  };
}
