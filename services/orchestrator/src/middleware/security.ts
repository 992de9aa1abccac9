import type { CorsOptions } from "cors";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * `*` in an entry matches within one origin component; an entry without a
 * scheme matches any scheme.
 */
export function compileOriginPattern(entry: string): RegExp {
  const hasScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(entry);
  const body = entry.split("*").map(escapeRegExp).join("[^/]*");
  return new RegExp(`^${hasScheme ? "" : "[a-z][a-z0-9+.-]*://"}${body}$`, "i");
}

export function isOriginAllowed(origin: string, crossDomains: readonly string[]): boolean {
  return crossDomains.some((entry) => entry === "*" || compileOriginPattern(entry).test(origin));
}

/** CORS options for the admin API, built from `Managers/API/CrossDomains`. */
export function determineCorsOptions(crossDomains: readonly string[]): CorsOptions {
  const entries = crossDomains.map((entry) => entry.trim()).filter(Boolean);

  return {
    origin(origin, callback) {
      if (!origin) {
        callback(null, true);
        return;
      }
      callback(null, isOriginAllowed(origin, entries));
    },
    credentials: true,
    optionsSuccessStatus: 204,
  };
}
