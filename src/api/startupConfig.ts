// ── Startup configuration validation ────────────────────────────────────────
//
// Validates the environment once at process start using zod. On failure the
// launcher prints the formatted issues and exits non-zero.

import { z } from "zod";

// ── Schema ──────────────────────────────────────────────────────────────────

export const DEFAULT_DB_PATH = "./data/govbridge.db";

/** Optional path env that trims input and falls back to the provided default when missing or blank. */
const optionalPathWithDefault = (defaultPath: string) =>
  z.string().optional().transform((value) => (value ?? "").trim() || defaultPath);

/** Integer env with a default; blank counts as missing. */
const intWithDefault = (defaultValue: number, min: number) =>
  z
    .string()
    .optional()
    .transform((value) => (value ?? "").trim())
    .pipe(z.union([z.literal("").transform(() => defaultValue), z.coerce.number().int().min(min)]));

export const startupConfigSchema = z.object({
  GOVBRIDGE_DB_PATH: optionalPathWithDefault(DEFAULT_DB_PATH),
  DRIVER_EVENT_RECEIVER_URL: z.string().url().optional().or(z.literal("").transform(() => undefined)),
  OUTBOUND_TIMEOUT_MS: intWithDefault(10_000, 1),
  PLUGIN_HOOK_TIMEOUT_MS: intWithDefault(30_000, 1),
  /** 0 disables the in-process scheduler. */
  PROCESS_UPDATE_INTERVAL_MS: intWithDefault(60_000, 0),
  PORT: intWithDefault(3002, 1),
});

export type AppConfig = z.infer<typeof startupConfigSchema>;

// ── Loader ──────────────────────────────────────────────────────────────────

/**
 * Parse and validate startup configuration from `process.env`.
 * Throws a `StartupConfigError` with formatted messages on failure.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = startupConfigSchema.safeParse(env);

  if (!result.success) {
    const messages = result.error.issues.map((issue) => `  • ${issue.path.join(".")}: ${issue.message}`);
    throw new StartupConfigError(`Startup config validation failed:\n${messages.join("\n")}`, result.error.issues);
  }

  return result.data;
}

/** Typed error thrown by loadConfig() so callers can inspect issues programmatically. */
export class StartupConfigError extends Error {
  readonly issues: z.ZodIssue[];
  constructor(message: string, issues: z.ZodIssue[]) {
    super(message);
    this.name = "StartupConfigError";
    this.issues = issues;
  }
}
