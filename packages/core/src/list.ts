import type { GhRunner } from "./gh";

/**
 * Fetch the pull request listing for a repository as raw gh output.
 *
 * Only the `number` field is requested. gh's exit status is not checked:
 * a failed listing shows up as unparseable output in the extractor.
 */
export function listPullRequests(gh: GhRunner, repo: string): Buffer {
  const { stdout } = gh.run(["pr", "list", "--repo", repo, "--json", "number"]);
  return stdout;
}
