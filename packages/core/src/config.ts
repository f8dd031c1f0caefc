import { access, readFile } from "node:fs/promises";
import { dirname, join } from "node:path";

import { PATHS, PROJECT_CONFIG_FILENAME } from "./paths";
import {
  DEFAULT_CONFIG,
  type PrcastConfig,
  PrcastConfigSchema,
} from "./schema/config";

// --------------------------------------------------------------------------
// Environment variable overrides
// --------------------------------------------------------------------------

type EnvParser = (value: string) => unknown;

const parseEnvString: EnvParser = (value) => value;

const parseEnvDebug: EnvParser = (value) =>
  value === "1" || value.toLowerCase() === "true" ? "debug" : undefined;

interface EnvMapping {
  key: keyof PrcastConfig;
  parse: EnvParser;
}

/**
 * Environment variables and the config keys they override.
 *
 * Precedence (highest to lowest):
 * 1. Environment variables (later entries win)
 * 2. Project config (.prcast.toml)
 * 3. User config (~/.config/prcast/config.toml)
 * 4. Schema defaults
 */
const ENV_MAP: [string, EnvMapping][] = [
  ["PRCAST_GH_PATH", { key: "gh_path", parse: parseEnvString }],
  ["PRCAST_LOG_LEVEL", { key: "log_level", parse: parseEnvString }],
  ["PRCAST_DEBUG", { key: "log_level", parse: parseEnvDebug }],
];

export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const result = { ...config };
  for (const [envKey, { key, parse }] of ENV_MAP) {
    const raw = env[envKey];
    if (raw === undefined || raw === "") {
      continue;
    }
    const value = parse(raw);
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

// --------------------------------------------------------------------------
// File discovery
// --------------------------------------------------------------------------

interface ConfigPaths {
  user: string;
  project?: string;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function findUp(
  startDir: string,
  match: (dir: string) => Promise<boolean>
): Promise<string | null> {
  let dir = startDir;
  for (;;) {
    if (await match(dir)) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Where the project config lives: the git root if there is one, otherwise
 * the nearest ancestor that already has a `.prcast.toml`.
 */
export async function getProjectConfigPath(
  cwd: string = process.cwd()
): Promise<string | null> {
  const gitRoot = await findUp(cwd, (dir) => exists(join(dir, ".git")));
  if (gitRoot) {
    return join(gitRoot, PROJECT_CONFIG_FILENAME);
  }

  const dir = await findUp(cwd, (d) => exists(join(d, PROJECT_CONFIG_FILENAME)));
  return dir ? join(dir, PROJECT_CONFIG_FILENAME) : null;
}

export async function getConfigPaths(
  cwd: string = process.cwd()
): Promise<ConfigPaths> {
  const project = await getProjectConfigPath(cwd);
  if (project !== null && (await exists(project))) {
    return { user: PATHS.configFile, project };
  }
  return { user: PATHS.configFile };
}

// --------------------------------------------------------------------------
// Parsing
// --------------------------------------------------------------------------

function stripInlineComment(value: string): string {
  let quote = "";
  for (let i = 0; i < value.length; i += 1) {
    const char = value.charAt(i);
    if (quote) {
      if (char === quote) {
        quote = "";
      }
      continue;
    }
    if (char === '"' || char === "'") {
      quote = char;
      continue;
    }
    if (char === "#") {
      return value.slice(0, i).trim();
    }
  }
  return value.trim();
}

/**
 * Every prcast setting is a string: quotes are stripped, bare values kept.
 */
function parseValue(value: string): string {
  if (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'")))
  ) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Parse flat TOML: top-level `key = value` pairs only.
 * Section headers and anything after them are ignored.
 */
export function parseTOML(text: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of text.split("\n")) {
    const trimmed = stripInlineComment(line.trim());
    if (!trimmed) {
      continue;
    }
    if (trimmed.startsWith("[")) {
      break;
    }

    const match = trimmed.match(/^([A-Za-z0-9_-]+)\s*=\s*(.+)$/);
    const key = match?.[1];
    const rawValue = match?.[2];
    if (!key || !rawValue) {
      continue;
    }
    result[key] = parseValue(rawValue.trim());
  }

  return result;
}

async function readConfigFile(
  path: string
): Promise<Record<string, string> | null> {
  if (!(await exists(path))) {
    return null;
  }
  return parseTOML(await readFile(path, "utf8"));
}

// --------------------------------------------------------------------------
// Loading
// --------------------------------------------------------------------------

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from user and project config files plus environment.
 * Invalid values produce a warning and the defaults.
 */
export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<PrcastConfig> {
  const cwd = options.cwd ?? process.cwd();
  const paths = await getConfigPaths(cwd);
  const userConfig = await readConfigFile(paths.user);
  const projectConfig = paths.project
    ? await readConfigFile(paths.project)
    : null;

  const merged = applyEnvOverrides(
    { ...DEFAULT_CONFIG, ...userConfig, ...projectConfig },
    options.env
  );

  const result = PrcastConfigSchema.safeParse(merged);
  if (result.success) {
    return result.data;
  }

  const message = result.error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
  console.error("Warning: Failed to parse config, using defaults:", message);
  return DEFAULT_CONFIG;
}
