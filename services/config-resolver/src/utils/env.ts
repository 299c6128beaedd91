import { readFileSync } from "node:fs";

function readFileValue(path: string): string | undefined {
  try {
    const content = readFileSync(path, "utf-8").trim();
    return content.length > 0 ? content : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Reads `NAME`, preferring the contents of the file named by `NAME_FILE`
 * when one is mounted.
 */
export function resolveEnv(
  name: string,
  fallback?: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const filePath = env[`${name}_FILE`];
  if (filePath) {
    const fromFile = readFileValue(filePath);
    if (fromFile !== undefined) {
      return fromFile;
    }
  }
  const direct = env[name];
  if (direct !== undefined && direct !== "") {
    return direct;
  }
  return fallback;
}

/**
 * Maps a dotted configuration name onto its environment variable:
 * `app.base.url` becomes `APP_BASE_URL`.
 */
export function toEnvironmentVariableName(name: string): string {
  return name.trim().toUpperCase().replace(/[.-]/g, "_");
}

/**
 * Reads a launch flag from argv, accepting both `--name=value` and
 * `--name value`. An empty value counts as absent.
 */
export function readLaunchFlag(name: string, argv: readonly string[] = process.argv): string | undefined {
  const flag = `--${name}`;
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === undefined) {
      continue;
    }
    if (arg.startsWith(`${flag}=`)) {
      const value = arg.slice(flag.length + 1).trim();
      return value.length > 0 ? value : undefined;
    }
    if (arg === flag) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        return undefined;
      }
      const value = next.trim();
      return value.length > 0 ? value : undefined;
    }
  }
  return undefined;
}

/**
 * Process-level override sources consulted by environment detection. Both
 * are re-read on every call; tests substitute fixed values.
 */
export type OverrideSource = {
  flag(name: string): string | undefined;
  env(name: string): string | undefined;
};

/**
 * Override source over an environment map and argv. `NAME_FILE` indirection
 * is not followed.
 */
export function createOverrides(
  env: NodeJS.ProcessEnv = process.env,
  argv: readonly string[] = process.argv,
): OverrideSource {
  return {
    flag: (name) => readLaunchFlag(name, argv),
    env: (name) => {
      const value = env[name];
      return value !== undefined && value !== "" ? value : undefined;
    },
  };
}

export const processOverrides: OverrideSource = createOverrides();
