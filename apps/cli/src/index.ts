import { VERSION } from "@prcast/shared";
import { Command } from "commander";

import { broadcastAction, type BroadcastDeps } from "./commands/broadcast";

export {
  broadcastAction,
  type BroadcastDeps,
  type BroadcastResult,
  type OutputSink,
} from "./commands/broadcast";

/**
 * Build the prcast program. `deps` is passed through to the action.
 */
export function createProgram(deps: BroadcastDeps = {}): Command {
  return new Command("prcast")
    .description(
      "Post the same comment on every pull request in a GitHub repository (via gh)"
    )
    .version(VERSION)
    .argument("<repository>", "Repository (owner/repo format)")
    .argument("<comment-file>", "File whose contents become the comment body")
    .action(async (repo: string, commentFile: string) => {
      await broadcastAction(repo, commentFile, deps);
    });
}

export async function run(argv: readonly string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
