/**
 * Forum Upvote — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * FLOWS: load .env → parse/validate → export typed env object (or exit 1)
 * DOCS:
 *  - zod: https://zod.dev
 *  - dotenv: https://github.com/motdotla/dotenv
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// Load .env from the working directory. In tests, values already set on
// process.env win so test setup can stub them before import.
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/**
 * Required vs optional settings. The token is the only required value; its
 * absence is a startup failure, never a runtime one.
 */
export const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.string().optional(),

  // Sentry error tracking - disabled if DSN not provided
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Pull the known keys out of a raw environment, trimming stray whitespace
 * (copy-paste accidents in .env files). Empty strings count as unset.
 */
export function readRawEnv(source: NodeJS.ProcessEnv): Record<keyof Env, string | undefined> {
  const pick = (key: keyof Env): string | undefined => {
    const value = source[key]?.trim();
    return value ? value : undefined;
  };
  return {
    DISCORD_TOKEN: pick("DISCORD_TOKEN") ?? "",
    NODE_ENV: pick("NODE_ENV"),
    LOG_LEVEL: pick("LOG_LEVEL"),
    SENTRY_DSN: pick("SENTRY_DSN"),
    SENTRY_ENVIRONMENT: pick("SENTRY_ENVIRONMENT"),
    SENTRY_TRACES_SAMPLE_RATE: pick("SENTRY_TRACES_SAMPLE_RATE"),
  };
}

/**
 * Validate a raw environment. Returns every issue at once, formatted one per line.
 */
export function parseEnv(
  source: NodeJS.ProcessEnv
): { ok: true; env: Env } | { ok: false; issues: string } {
  const parsed = envSchema.safeParse(readRawEnv(source));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
    return { ok: false, issues };
  }
  return { ok: true, env: parsed.data };
}

const result = parseEnv(process.env);
if (!result.ok) {
  console.error(`Environment validation failed:\n${result.issues}`);
  process.exit(1);
}
export const env: Env = result.env;
