import type { GhRunner } from "./gh";

const decoder = new TextDecoder("utf-8");

/**
 * Post the contents of `commentFile` on every listed pull request, in order.
 *
 * Returns the concatenated stdout of each gh call with no separator.
 * A failing call does not stop the loop; its exit status is only logged
 * by the runner.
 */
export function commentOnPullRequests(
  gh: GhRunner,
  numbers: readonly number[],
  repo: string,
  commentFile: string
): string {
  let output = "";
  for (const pr of numbers) {
    const { stdout } = gh.run([
      "pr",
      "comment",
      String(pr),
      "--repo",
      repo,
      "--body-file",
      commentFile,
    ]);
    output += decoder.decode(stdout);
  }
  return output;
}
