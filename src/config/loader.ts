// ─── Codec Config Loader ─────────────────────────────────────────────────────
//
// Reads a codec config from a JSON file, validates it with Zod, and fills
// defaults. The CLI and MCP server look for the file named by
// MIDIWIRE_CONFIG.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync, existsSync } from "node:fs";
import { CodecConfigSchema, resolveCodecConfig, type CodecConfig } from "./schema.js";

/** Environment variable naming an optional config file. */
export const CONFIG_ENV_VAR = "MIDIWIRE_CONFIG";

/**
 * Load and validate a codec config file.
 */
export function loadCodecConfig(filePath: string): CodecConfig {
  if (!existsSync(filePath)) {
    throw new Error(`Config not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new Error(
      `Config ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = CodecConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid config ${filePath}:\n${issues}`);
  }

  return result.data;
}

/**
 * Config for a process: the file named by MIDIWIRE_CONFIG when set,
 * defaults otherwise.
 */
export function loadCodecConfigFromEnv(env: NodeJS.ProcessEnv = process.env): CodecConfig {
  const filePath = env[CONFIG_ENV_VAR];
  if (filePath === undefined || filePath.trim() === "") {
    return resolveCodecConfig();
  }
  return loadCodecConfig(filePath);
}
