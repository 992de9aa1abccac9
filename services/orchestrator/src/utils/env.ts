import { readFileSync } from "node:fs";

import { toBool } from "../values/converters.js";

function readFileValue(path: string): string | undefined {
  try {
    const content = readFileSync(path, "utf-8").trim();
    return content.length > 0 ? content : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Reads `name` from the environment. `<name>_FILE` wins when it points at a
 * readable, non-empty file, so tokens can come from mounted secrets.
 */
export function resolveEnv(
  name: string,
  fallback?: string,
): string | undefined {
  const filePath = process.env[`${name}_FILE`];
  if (filePath) {
    const fromFile = readFileValue(filePath);
    if (fromFile !== undefined) {
      return fromFile;
    }
  }
  const direct = process.env[name];
  if (direct !== undefined && direct !== "") {
    return direct;
  }
  return fallback;
}

/** Same tokens as boolean configuration values: true/yes/on/1 and false/no/off/0. */
export function resolveEnvFlag(name: string): boolean | undefined {
  const value = resolveEnv(name);
  if (value === undefined) {
    return undefined;
  }
  return toBool(value);
}
