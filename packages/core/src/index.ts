/**
 * prcast core library
 *
 * Lists a repository's pull requests through the gh CLI and posts one
 * comment file on each of them.
 */

// gh runner
export {
  createGhRunner,
  GH_MAX_BUFFER,
  type GhResult,
  type GhRunner,
  type GhRunnerOptions,
} from "./gh";

// Pipeline
export { listPullRequests } from "./list";
export { extractPullRequestNumbers, PullRequestListSchema } from "./extract";
export { commentOnPullRequests } from "./comment";
export { formatConfirmPrompt, isConfirmation } from "./confirm";

// Config
export {
  applyEnvOverrides,
  getConfigPaths,
  getProjectConfigPath,
  loadConfig,
  parseTOML,
  type LoadConfigOptions,
} from "./config";
export { PATHS, PROJECT_CONFIG_FILENAME } from "./paths";
export {
  DEFAULT_CONFIG,
  LogLevelSchema,
  PrcastConfigSchema,
  type PrcastConfig,
} from "./schema/config";
