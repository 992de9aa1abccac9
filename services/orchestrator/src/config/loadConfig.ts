import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ZodError } from "zod";

import { resolveEnv, resolveEnvFlag } from "../utils/env.js";
import { toError } from "../utils/errorUtils.js";
import { AppConfigSchema, type AppConfig } from "./schema.js";

export type { AppConfig } from "./schema.js";

type PartialAppConfig = {
  runMode?: string;
  serverConfigPath?: string;
  admin?: {
    host?: string;
    jsonLimitBytes?: number;
  };
  dump?: {
    enabled?: boolean;
    includeDefaults?: boolean;
  };
};

export class ConfigLoadError extends Error {
  constructor(message: string, cause: Error) {
    super(`${message}: ${cause.message}`, { cause });
    this.name = "ConfigLoadError";
  }
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;
}

function asString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function asNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function asBoolean(value: unknown): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

function parseFileConfig(doc: Record<string, unknown>): PartialAppConfig {
  const admin = asRecord(doc.admin);
  const dump = asRecord(doc.dump);
  return {
    runMode: asString(doc.runMode ?? doc.run_mode),
    serverConfigPath: asString(doc.serverConfigPath ?? doc.server_config_path),
    admin: admin
      ? {
          host: asString(admin.host),
          jsonLimitBytes: asNumber(admin.jsonLimitBytes ?? admin.json_limit_bytes),
        }
      : undefined,
    dump: dump
      ? {
          enabled: asBoolean(dump.enabled),
          includeDefaults: asBoolean(dump.includeDefaults ?? dump.include_defaults),
        }
      : undefined,
  };
}

function readEnvConfig(): PartialAppConfig {
  const jsonLimit = resolveEnv("ADMIN_JSON_LIMIT");
  return {
    runMode: resolveEnv("RUN_MODE")?.trim().toLowerCase(),
    serverConfigPath: resolveEnv("SERVER_CONFIG_PATH"),
    admin: {
      host: resolveEnv("ADMIN_HOST"),
      jsonLimitBytes: jsonLimit === undefined ? undefined : asNumber(jsonLimit),
    },
    dump: {
      includeDefaults: resolveEnvFlag("DUMP_DEFAULTS"),
    },
  };
}

function defined(record: Record<string, unknown> | undefined): Record<string, unknown> {
  if (!record) {
    return {};
  }
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}

/** Environment values win over the file; undefined entries never overwrite. */
function mergeConfig(file: PartialAppConfig, env: PartialAppConfig): Record<string, unknown> {
  return {
    ...defined(file),
    ...defined(env),
    admin: { ...defined(file.admin), ...defined(env.admin) },
    dump: { ...defined(file.dump), ...defined(env.dump) },
  };
}

function formatIssues(error: ZodError): Error {
  const summary = error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
    .join("; ");
  return new Error(summary);
}

type ConfigCacheState = {
  path: string;
  mtimeMs: number | null;
  config: AppConfig;
};

type ConfigFileMetadata = {
  exists: boolean;
  mtimeMs: number | null;
};

let configCache: ConfigCacheState | undefined;

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

function readConfigFileMetadata(filePath: string): ConfigFileMetadata {
  try {
    const stats = fs.statSync(filePath);
    return { exists: true, mtimeMs: stats.mtimeMs };
  } catch (error) {
    if (isMissingFile(error)) {
      return { exists: false, mtimeMs: null };
    }
    throw error;
  }
}

function getCachedConfig(filePath: string, metadata: ConfigFileMetadata): AppConfig | undefined {
  if (!configCache || configCache.path !== filePath) {
    return undefined;
  }
  if (!metadata.exists) {
    return configCache.mtimeMs === null ? configCache.config : undefined;
  }
  if (configCache.mtimeMs === null) {
    return undefined;
  }
  return metadata.mtimeMs === configCache.mtimeMs ? configCache.config : undefined;
}

export function invalidateConfigCache(): void {
  configCache = undefined;
}

/**
 * Loads process settings from `APP_CONFIG` (default `config/app.yaml`) and the
 * environment. A missing file means defaults plus environment. Results are
 * cached until the file's mtime changes; environment changes need
 * `invalidateConfigCache`.
 *
 * @throws ConfigLoadError when the file cannot be parsed or a value is invalid
 */
export function loadConfig(): AppConfig {
  const cfgPath = process.env.APP_CONFIG || path.join(process.cwd(), "config", "app.yaml");
  const metadata = readConfigFileMetadata(cfgPath);
  const cached = getCachedConfig(cfgPath, metadata);
  if (cached) {
    return cached;
  }

  let fileCfg: PartialAppConfig = {};
  if (metadata.exists) {
    try {
      const parsed: unknown = YAML.parse(fs.readFileSync(cfgPath, "utf-8"));
      const doc = asRecord(parsed);
      if (doc) {
        fileCfg = parseFileConfig(doc);
      }
    } catch (error) {
      throw new ConfigLoadError(
        `Failed to read configuration file ${cfgPath}`,
        toError(error),
      );
    }
  }

  const result = AppConfigSchema.safeParse(mergeConfig(fileCfg, readEnvConfig()));
  if (!result.success) {
    throw new ConfigLoadError("Invalid configuration", formatIssues(result.error));
  }

  configCache = { path: cfgPath, mtimeMs: metadata.mtimeMs, config: result.data };
  return result.data;
}
