/**
 * Forum Upvote — tests/env.test.ts
 * WHAT: Tests for environment parsing and validation.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { parseEnv, readRawEnv } from "../src/lib/env.js";

describe("readRawEnv", () => {
  it("trims values and treats empty strings as unset", () => {
    expect(
      readRawEnv({ DISCORD_TOKEN: "  test-token \n", LOG_LEVEL: "   ", SENTRY_DSN: "" })
    ).toEqual({
      DISCORD_TOKEN: "test-token",
      NODE_ENV: undefined,
      LOG_LEVEL: undefined,
      SENTRY_DSN: undefined,
      SENTRY_ENVIRONMENT: undefined,
      SENTRY_TRACES_SAMPLE_RATE: undefined,
    });
  });

  it("maps a missing token to an empty string", () => {
    expect(readRawEnv({}).DISCORD_TOKEN).toBe("");
  });

  it("ignores unrelated keys", () => {
    expect(readRawEnv({ DISCORD_TOKEN: "test-token", HOME: "/root" })).not.toHaveProperty("HOME");
  });
});

describe("parseEnv", () => {
  it("applies defaults", () => {
    const result = parseEnv({ DISCORD_TOKEN: "test-token" });
    expect(result).toEqual({
      ok: true,
      env: {
        DISCORD_TOKEN: "test-token",
        NODE_ENV: "development",
        SENTRY_TRACES_SAMPLE_RATE: 0.1,
      },
    });
  });

  it("coerces the traces sample rate", () => {
    const result = parseEnv({ DISCORD_TOKEN: "test-token", SENTRY_TRACES_SAMPLE_RATE: "0.5" });
    expect(result.ok && result.env.SENTRY_TRACES_SAMPLE_RATE).toBe(0.5);
  });

  it("fails without a token", () => {
    expect(parseEnv({ NODE_ENV: "production" })).toEqual({
      ok: false,
      issues: "- DISCORD_TOKEN: Missing DISCORD_TOKEN",
    });
  });

  it("fails on a whitespace-only token", () => {
    expect(parseEnv({ DISCORD_TOKEN: "   " }).ok).toBe(false);
  });

  it("reports every issue, one per line", () => {
    const result = parseEnv({ NODE_ENV: "staging", SENTRY_TRACES_SAMPLE_RATE: "2" });
    expect(result.ok).toBe(false);
    if (result.ok) return;

    const lines = result.issues.split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe("- DISCORD_TOKEN: Missing DISCORD_TOKEN");
    expect(lines[1]).toMatch(/^- NODE_ENV: /);
    expect(lines[2]).toMatch(/^- SENTRY_TRACES_SAMPLE_RATE: /);
  });
});
