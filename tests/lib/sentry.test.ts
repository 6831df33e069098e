/**
 * Forum Upvote — tests/lib/sentry.test.ts
 * WHAT: Tests for Sentry bootstrap, DSN validation and the disabled paths.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";

const { mockSentry, mockLogger, mockEnv, mockClient } = vi.hoisted(() => {
  const mockClient = { on: vi.fn() };
  return {
    mockClient,
    mockSentry: {
      init: vi.fn(),
      getClient: vi.fn(() => mockClient),
      captureException: vi.fn(() => "event-1"),
      close: vi.fn(async () => true),
      consoleIntegration: vi.fn(() => ({ name: "Console" })),
      onUncaughtExceptionIntegration: vi.fn(() => ({ name: "OnUncaughtException" })),
      onUnhandledRejectionIntegration: vi.fn(() => ({ name: "OnUnhandledRejection" })),
    },
    mockLogger: {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
    },
    mockEnv: {
      DISCORD_TOKEN: "test-token",
      NODE_ENV: "test",
      SENTRY_DSN: undefined as string | undefined,
      SENTRY_ENVIRONMENT: undefined as string | undefined,
      SENTRY_TRACES_SAMPLE_RATE: 0.1,
    },
  };
});

vi.mock("@sentry/node", () => mockSentry);
vi.mock("../../src/lib/logger.js", () => ({ logger: mockLogger }));
vi.mock("../../src/lib/env.js", () => ({ env: mockEnv }));

const VALID_DSN = "https://publickey@sentry.example.com/42";
const FAKE_TOKEN = `${"a".repeat(24)}.${"b".repeat(6)}.${"c".repeat(27)}`;

async function loadSentry() {
  vi.resetModules();
  return import("../../src/lib/sentry.js");
}

beforeEach(() => {
  mockEnv.SENTRY_DSN = undefined;
  mockEnv.SENTRY_ENVIRONMENT = undefined;
  mockSentry.getClient.mockReturnValue(mockClient);
  mockSentry.captureException.mockReturnValue("event-1");
  mockSentry.close.mockResolvedValue(true);
});

describe("hasValidDsn", () => {
  it("accepts a key@host/project DSN", async () => {
    const { hasValidDsn } = await loadSentry();
    expect(hasValidDsn(VALID_DSN)).toBe(true);
  });

  it("rejects missing or malformed DSNs", async () => {
    const { hasValidDsn } = await loadSentry();
    expect(hasValidDsn(undefined)).toBe(false);
    expect(hasValidDsn("")).toBe(false);
    expect(hasValidDsn("not a url")).toBe(false);
    expect(hasValidDsn("https://sentry.example.com/42")).toBe(false);
    expect(hasValidDsn("https://publickey@sentry.example.com/")).toBe(false);
    expect(hasValidDsn("ftp://publickey@sentry.example.com/42")).toBe(false);
  });
});

describe("when disabled", () => {
  it("skips initialization under Vitest", async () => {
    mockEnv.SENTRY_DSN = VALID_DSN;
    const sentry = await loadSentry();

    sentry.initializeSentry();

    expect(mockSentry.init).not.toHaveBeenCalled();
    expect(sentry.isSentryEnabled()).toBe(false);
  });

  it("logs and stays off without a DSN", async () => {
    vi.stubEnv("VITEST_WORKER_ID", "");
    const sentry = await loadSentry();

    sentry.initializeSentry();

    expect(mockSentry.init).not.toHaveBeenCalled();
    expect(mockLogger.info).toHaveBeenCalledWith(
      "Sentry DSN missing or invalid, error tracking disabled"
    );
  });

  it("captureException returns null and flushSentry resolves true", async () => {
    const sentry = await loadSentry();

    expect(sentry.captureException(new Error("x"))).toBeNull();
    await expect(sentry.flushSentry()).resolves.toBe(true);
    expect(mockSentry.captureException).not.toHaveBeenCalled();
    expect(mockSentry.close).not.toHaveBeenCalled();
  });
});

describe("when enabled", () => {
  async function enable() {
    vi.stubEnv("VITEST_WORKER_ID", "");
    mockEnv.SENTRY_DSN = VALID_DSN;
    const sentry = await loadSentry();
    sentry.initializeSentry();
    return sentry;
  }

  it("initializes with the configured DSN and release", async () => {
    const sentry = await enable();

    expect(sentry.isSentryEnabled()).toBe(true);
    expect(mockSentry.init).toHaveBeenCalledWith(
      expect.objectContaining({
        dsn: VALID_DSN,
        environment: "test",
        release: "forum-upvote-bot@1.0.0",
        tracesSampleRate: 0.1,
        debug: false,
      })
    );
  });

  it("prefers SENTRY_ENVIRONMENT over NODE_ENV", async () => {
    mockEnv.SENTRY_ENVIRONMENT = "staging";
    await enable();

    expect(mockSentry.init).toHaveBeenCalledWith(expect.objectContaining({ environment: "staging" }));
  });

  it("forwards captures with custom context", async () => {
    const sentry = await enable();
    const err = new Error("boom");

    expect(sentry.captureException(err, { event: "threadCreate" })).toBe("event-1");
    expect(mockSentry.captureException).toHaveBeenCalledWith(err, {
      contexts: { custom: { event: "threadCreate" } },
    });
  });

  it("flushes through Sentry.close with the timeout", async () => {
    const sentry = await enable();

    await expect(sentry.flushSentry(500)).resolves.toBe(true);
    expect(mockSentry.close).toHaveBeenCalledWith(500);
  });

  it("resolves false when the flush fails", async () => {
    const sentry = await enable();
    mockSentry.close.mockRejectedValueOnce(new Error("offline"));

    await expect(sentry.flushSentry()).resolves.toBe(false);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error) }),
      "Failed to flush Sentry events"
    );
  });

  it("redacts tokens before sending", async () => {
    await enable();
    const options = mockSentry.init.mock.calls[0][0];

    const event = options.beforeSend({
      message: `leaked ${FAKE_TOKEN}`,
      contexts: { runtime: { name: "node", env: { DISCORD_TOKEN: "test-token", HOME: "/root" } } },
    });

    expect(event.message).toBe("leaked [REDACTED_TOKEN]");
    expect(event.contexts.runtime).toEqual({
      name: "node",
      env: { DISCORD_TOKEN: "[REDACTED]", HOME: "/root" },
    });
  });

  it("disables capture after a 403 from Sentry", async () => {
    const sentry = await enable();
    const [eventName, onAfterSend] = mockClient.on.mock.calls[0];
    expect(eventName).toBe("afterSendEvent");

    onAfterSend({}, { statusCode: 403 });

    expect(sentry.isSentryEnabled()).toBe(false);
    expect(sentry.captureException(new Error("x"))).toBeNull();
  });

  it("stays disabled when init throws", async () => {
    mockSentry.init.mockImplementationOnce(() => {
      throw new Error("bad options");
    });
    const sentry = await enable();

    expect(sentry.isSentryEnabled()).toBe(false);
    expect(mockLogger.error).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error) }),
      "Failed to initialize Sentry"
    );
  });
});
