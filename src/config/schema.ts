// ─── Codec Config Schema ─────────────────────────────────────────────────────
//
// The codec has two tunables, both fixed when a stream or registry is
// created: the SysEx reassembly capacity and the number of streams a
// registry will hold.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";

/** Default SysEx reassembly capacity, in payload bytes. */
export const DEFAULT_MAX_SYSEX_BYTES = 4096;

/** Default number of streams a registry may hold. */
export const DEFAULT_MAX_STREAMS = 64;

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const CodecConfigSchema = z.object({
  maxSysexBytes: z.number().int().min(1).max(1_048_576).default(DEFAULT_MAX_SYSEX_BYTES),
  maxStreams: z.number().int().min(1).max(1024).default(DEFAULT_MAX_STREAMS),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

/** Fully resolved configuration. */
export type CodecConfig = z.infer<typeof CodecConfigSchema>;

/** Configuration as a caller may supply it (defaults fill the gaps). */
export type CodecConfigInput = z.input<typeof CodecConfigSchema>;

// ─── Validation ──────────────────────────────────────────────────────────────

export interface ConfigError {
  field: string;
  message: string;
}

/**
 * Validate a config object using the zod schema.
 * Returns an empty array if valid.
 */
export function validateCodecConfig(config: unknown): ConfigError[] {
  const result = CodecConfigSchema.safeParse(config);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

/**
 * Apply defaults to a partial config. Throws on invalid values.
 */
export function resolveCodecConfig(config: CodecConfigInput = {}): CodecConfig {
  const result = CodecConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid codec config:\n${issues}`);
  }
  return result.data;
}
