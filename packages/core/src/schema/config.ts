import { z } from "zod";

export const LogLevelSchema = z.enum([
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
]);

/**
 * prcast configuration schema.
 * Stored in ~/.config/prcast/config.toml (user) and .prcast.toml (project)
 */
export const PrcastConfigSchema = z.object({
  /** gh executable name or absolute path */
  gh_path: z.string().min(1).default("gh"),
  /** Minimum level for diagnostic logging on stderr */
  log_level: LogLevelSchema.default("warn"),
});

export type PrcastConfig = z.infer<typeof PrcastConfigSchema>;

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: PrcastConfig = {
  gh_path: "gh",
  log_level: "warn",
};
