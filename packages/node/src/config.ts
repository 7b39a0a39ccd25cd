/**
 * Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // History
  HISTORY_MAX_ENTRIES: z.coerce.number().int().min(0).default(0),
  HISTORY_START_ACTIVE: z
    .string()
    .transform((v) => v === "true")
    .default("false"),
  HISTORY_ROOT_TYPE: z.string().min(1).default("event"),
  HISTORY_TYPES: z.string().default(""),
  HISTORY_STREAM_BUFFER: z.coerce.number().int().min(1).default(1000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Type Hierarchy Parsing
// =============================================================================

export interface TypeDefinition {
  readonly name: string;
  readonly parent?: string | undefined;
}

/**
 * Parse the HISTORY_TYPES env var into type definitions.
 *
 * Format: "child:parent,other,grandchild:child"
 * An entry without a parent sits directly under the root. Parents must
 * appear before their children.
 */
export function parseTypeHierarchy(raw: string): readonly TypeDefinition[] {
  if (raw.trim() === "") {
    return [];
  }

  const definitions: TypeDefinition[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    if (parts.length > 2) {
      throw new Error(
        `Invalid HISTORY_TYPES entry: "${entry.trim()}". Expected format: type or type:parent`,
      );
    }

    const [name = "", parent] = parts.map((p) => p.trim());
    if (name === "") {
      throw new Error("Type name cannot be empty in HISTORY_TYPES");
    }
    if (parent === "") {
      throw new Error(`Parent type cannot be empty in HISTORY_TYPES entry "${name}"`);
    }

    definitions.push(parent === undefined ? { name } : { name, parent });
  }

  return definitions;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
