/**
 * Sandbox configuration
 *
 * Zod-validated environment config and environment stripping for
 * subprocess isolation.
 */

import { z } from 'zod';
import { resolve } from 'node:path';
import { ConfigurationError } from '@mender/shared/Types/errors.js';
import { expandPath, getEnvBoolean } from '@mender/shared/Utils/config.js';

// ── Schema ───────────────────────────────────────────────────────────────────

const configSchema = z.object({
  sandboxDir: z.string().min(1).default('~/.mender/sandbox'),
  killGraceMs: z.coerce.number().int().positive().default(2_000),
  maxOutputChars: z.coerce.number().int().positive().default(10_000),
  truncationHead: z.coerce.number().int().positive().default(4_000),
  truncationTail: z.coerce.number().int().positive().default(4_000),
  logDir: z.string().min(1).default('~/.mender/logs'),
  logExecutions: z.boolean().default(true),
  keepWorkspaces: z.boolean().default(false),
  maxFileSizeBytes: z.coerce.number().int().positive().default(52_428_800), // 50MB
  // Unset by default: RLIMIT_NPROC counts every thread of the user, and a
  // Node interpreter alone starts about ten.
  maxProcesses: z.coerce.number().int().positive().optional(),
}).refine((c) => c.truncationHead + c.truncationTail < c.maxOutputChars, {
  message: 'truncationHead + truncationTail must be below maxOutputChars',
});

export type SandboxConfig = z.infer<typeof configSchema>;

// ── Loading ──────────────────────────────────────────────────────────────────

/**
 * Validate a config object, applying defaults and expanding ~ in paths.
 */
export function parseSandboxConfig(input: Record<string, unknown>): SandboxConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Sandbox config error: ${result.error.message}`, result.error.issues);
  }

  const config = result.data;
  config.sandboxDir = resolve(expandPath(config.sandboxDir));
  config.logDir = resolve(expandPath(config.logDir));
  return config;
}

let cached: SandboxConfig | null = null;

export function getConfig(): SandboxConfig {
  if (cached) return cached;

  const raw = {
    sandboxDir: process.env.MENDER_SANDBOX_DIR,
    killGraceMs: process.env.MENDER_SANDBOX_KILL_GRACE_MS,
    maxOutputChars: process.env.MENDER_SANDBOX_MAX_OUTPUT_CHARS,
    truncationHead: process.env.MENDER_SANDBOX_TRUNCATION_HEAD,
    truncationTail: process.env.MENDER_SANDBOX_TRUNCATION_TAIL,
    logDir: process.env.MENDER_SANDBOX_LOG_DIR,
    logExecutions: getEnvBoolean('MENDER_SANDBOX_LOG_EXECUTIONS'),
    keepWorkspaces: getEnvBoolean('MENDER_SANDBOX_KEEP_WORKSPACES'),
    maxFileSizeBytes: process.env.MENDER_SANDBOX_MAX_FILE_SIZE_BYTES,
    maxProcesses: process.env.MENDER_SANDBOX_MAX_PROCESSES,
  };

  // Strip undefined keys so Zod defaults kick in
  const cleaned = Object.fromEntries(
    Object.entries(raw).filter(([, v]) => v !== undefined),
  );

  cached = parseSandboxConfig(cleaned);
  return cached;
}

/** Reset cached config (for testing) */
export function resetConfig(): void {
  cached = null;
}

// ── Stripped Environment ─────────────────────────────────────────────────────

const ENV_ALLOWLIST = ['PATH', 'HOME', 'LANG', 'TERM', 'TMPDIR', 'USER'];

/**
 * Build a minimal environment for subprocess execution.
 * Only allowlisted vars pass through. API keys and tokens stay out.
 */
export function getStrippedEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of ENV_ALLOWLIST) {
    const val = process.env[key];
    if (val !== undefined) {
      env[key] = val;
    }
  }
  return env;
}
