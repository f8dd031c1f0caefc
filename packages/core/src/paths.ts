import envPaths from "env-paths";
import { join } from "node:path";

/**
 * Resolve the config directory with XDG override support.
 *
 * On macOS, env-paths returns ~/Library/Preferences and ignores
 * XDG_CONFIG_HOME, so an explicit XDG value wins there.
 */
function resolveConfigDir(): string {
  const defaults = envPaths("prcast", { suffix: "" });

  if (process.platform !== "darwin") {
    return defaults.config;
  }

  const xdgConfig = process.env["XDG_CONFIG_HOME"];
  return xdgConfig ? join(xdgConfig, "prcast") : defaults.config;
}

const configDir = resolveConfigDir();

/**
 * Filesystem locations used by prcast. Mutable so tests can redirect them.
 */
export const PATHS = {
  /** Config directory (~/.config/prcast) */
  config: configDir,

  /** User config file */
  configFile: join(configDir, "config.toml"),
};

export const PROJECT_CONFIG_FILENAME = ".prcast.toml";
