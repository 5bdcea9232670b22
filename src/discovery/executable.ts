import { stat } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";

import { InvalidHarnessOptionsError, ServiceExecutableNotFoundError } from "../errors.js";
import { StructuredLogger } from "../logger.js";

export const DEFAULT_EXECUTABLE_ENV_VAR = "HARNESS_SERVICE_EXE";

/** Build output directories searched, in order, under the project root. */
export const DEFAULT_SEARCH_DIRS: readonly string[] = [
  "build/server",
  "build/server/Release",
  "build/server/Debug",
  "build-server",
  "build-server/Release",
  "build-server/Debug",
];

export interface ResolveExecutableOptions {
  /** Path given by the caller; wins over everything else and must exist. */
  explicit?: string;
  /** Environment variable consulted next. Defaults to `HARNESS_SERVICE_EXE`. */
  envVar?: string;
  /** Project root the search directories are relative to. Defaults to the working directory. */
  root?: string;
  /** Binary names tried in every search directory. Required unless a path is given or the variable is set. */
  names: readonly string[];
  searchDirs?: readonly string[];
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  logger?: StructuredLogger;
}

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

function withPlatformVariants(names: readonly string[], platform: NodeJS.Platform): string[] {
  if (platform !== "win32") {
    return [...names];
  }
  return names.flatMap((name) => (name.toLowerCase().endsWith(".exe") ? [name] : [`${name}.exe`, name]));
}

/**
 * Finds the service binary: explicit path, then the environment variable,
 * then every search directory × name under the root. Throws
 * {@link ServiceExecutableNotFoundError} listing every path tried.
 */
export async function resolveServiceExecutable(options: ResolveExecutableOptions): Promise<string> {
  const root = resolve(options.root ?? process.cwd());
  const env = options.env ?? process.env;
  const envVar = options.envVar ?? DEFAULT_EXECUTABLE_ENV_VAR;
  const logger = options.logger ?? new StructuredLogger();
  const tried: string[] = [];

  const absolute = (path: string) => (isAbsolute(path) ? path : resolve(root, path));

  if (options.explicit !== undefined) {
    const candidate = absolute(options.explicit);
    if (await isRegularFile(candidate)) {
      return candidate;
    }
    throw new ServiceExecutableNotFoundError([candidate]);
  }

  const fromEnv = env[envVar]?.trim();
  if (fromEnv) {
    const candidate = absolute(fromEnv);
    tried.push(candidate);
    if (await isRegularFile(candidate)) {
      return candidate;
    }
    logger.warn("executable_env_missing", { envVar, path: candidate });
  }

  if (options.names.length === 0) {
    if (tried.length > 0) {
      throw new ServiceExecutableNotFoundError(tried);
    }
    throw new InvalidHarnessOptionsError([
      `executable: no path given, ${envVar} is unset and no binary names to search for`,
    ]);
  }

  const names = withPlatformVariants(options.names, options.platform ?? process.platform);
  for (const dir of options.searchDirs ?? DEFAULT_SEARCH_DIRS) {
    for (const name of names) {
      const candidate = join(root, dir, name);
      tried.push(candidate);
      if (await isRegularFile(candidate)) {
        logger.debug("executable_resolved", { path: candidate });
        return candidate;
      }
    }
  }

  throw new ServiceExecutableNotFoundError(tried);
}
