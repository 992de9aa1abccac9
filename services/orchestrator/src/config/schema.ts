/**
 * Process settings for the configuration service, validated with zod.
 *
 * These are the settings around the media server document (where it lives,
 * how the admin listener behaves), not the document itself; the document is
 * bound into the node classes under `src/schemas`.
 */

import { z } from "zod";

// ============================================================================
// Admin Listener
// ============================================================================

export const RunModeSchema = z.enum(["development", "production"]);
export type RunMode = z.infer<typeof RunModeSchema>;

export const AdminConfigSchema = z.object({
  host: z.string().min(1).default("0.0.0.0"),
  jsonLimitBytes: z.number().int().min(1024).max(104857600).default(1048576), // 1MB default
});
export type AdminConfig = z.infer<typeof AdminConfigSchema>;

// ============================================================================
// Startup Dump
// ============================================================================

export const DumpConfigSchema = z.object({
  /** Log the effective server configuration at startup. */
  enabled: z.boolean().default(true),
  /** Include values that were never set in the document. */
  includeDefaults: z.boolean().default(false),
});
export type DumpConfig = z.infer<typeof DumpConfigSchema>;

// ============================================================================
// Root Settings Schema
// ============================================================================

export const AppConfigSchema = z.object({
  runMode: RunModeSchema.default("development"),
  serverConfigPath: z.string().min(1).default("config/Server.xml"),
  admin: AdminConfigSchema.default({}),
  dump: DumpConfigSchema.default({}),
});
export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Validate and parse settings, returning a strongly-typed result.
 * @throws ZodError if validation fails
 */
export function validateConfig(input: unknown): AppConfig {
  return AppConfigSchema.parse(input);
}

export function getDefaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}
