/**
 * Forum Upvote — src/lib/errors.ts
 * WHAT: Error classes raised by the core, plus a discriminated union for logging.
 * FLOWS:
 *  - Thread handler throws MissingParentError / RemoteApiError
 *  - Gateway source rejects with GatewayTransportError { fatal }
 *  - classifyError(err) → ClassifiedError union → errorContext() log fields
 *  - shouldReportToSentry(err) → boolean (filter noise)
 * USAGE:
 *  import { classifyError, errorContext } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "remote_api" && classified.code === 50013) { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Error Classes =====

/**
 * A thread arrived without a parent channel id. Discord always sends one for
 * threads, so this is an anomaly worth surfacing, not something to skip.
 */
export class MissingParentError extends Error {
  readonly kind = "missing_parent";

  constructor(readonly threadId: string) {
    super("Discord did not send a parent channel ID, are you sure this is a thread?");
    this.name = "MissingParentError";
  }
}

export type RemoteApiOperation = "fetchChannel" | "addReaction";

/**
 * Any failure of a REST call: transport, HTTP status, or an unexpected body.
 * The original error is kept as `cause`.
 */
export class RemoteApiError extends Error {
  readonly kind = "remote_api";

  constructor(
    readonly operation: RemoteApiOperation,
    readonly channelId: string,
    cause: unknown
  ) {
    super(`discord api error during ${operation}: ${describeCause(cause)}`, { cause });
    this.name = "RemoteApiError";
  }
}

/**
 * Error reported by the gateway event source. `fatal` is decided by the source;
 * the loop never infers it from the error type.
 */
export class GatewayTransportError extends Error {
  readonly kind = "transport";

  /** Gateway close code, when the error came from a closed socket */
  readonly code: number | undefined;

  constructor(
    message: string,
    readonly fatal: boolean,
    options?: { cause?: unknown; code?: number }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "GatewayTransportError";
    this.code = options?.code;
  }
}

/**
 * Wrap a caught REST failure, passing RemoteApiError through unchanged.
 */
export function toRemoteApiError(
  operation: RemoteApiOperation,
  channelId: string,
  err: unknown
): RemoteApiError {
  if (err instanceof RemoteApiError) return err;
  return new RemoteApiError(operation, channelId, err);
}

/**
 * Fatal flag carried on a source error value. Anything without the flag is
 * treated as recoverable.
 */
export function isFatalTransportError(err: unknown): boolean {
  return (
    typeof err === "object" && err !== null && "fatal" in err && err.fatal === true
  );
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

// ===== Classified Errors =====

/**
 * Base shape for the discriminated union. `kind` is the discriminator.
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

export interface MissingParentClassified extends AppError {
  kind: "missing_parent";
  threadId: string;
}

/**
 * REST failure from one of our two calls. `code` is the Discord JSON error code
 * (10003 Unknown Channel, 50001 Missing Access, 50013 Missing Permissions, ...).
 */
export interface RemoteApiClassified extends AppError {
  kind: "remote_api";
  operation: RemoteApiOperation;
  channelId: string;
  code?: number;
  httpStatus?: number;
}

export interface TransportClassified extends AppError {
  kind: "transport";
  fatal: boolean;
  code?: number;
}

/** Discord API error raised outside the core's own wrappers */
export interface DiscordApiClassified extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

/** Node.js system errors: the request never reached Discord or the socket dropped */
export interface NetworkClassified extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

export interface UnknownClassified extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | MissingParentClassified
  | RemoteApiClassified
  | TransportClassified
  | DiscordApiClassified
  | NetworkClassified
  | UnknownClassified;

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

type Probe = {
  name?: unknown;
  message?: unknown;
  code?: unknown;
  status?: unknown;
  httpStatus?: unknown;
  method?: unknown;
  url?: unknown;
  path?: unknown;
  hostname?: unknown;
  host?: unknown;
};

const PROBE_KEYS = [
  "name",
  "message",
  "code",
  "status",
  "httpStatus",
  "method",
  "url",
  "path",
  "hostname",
  "host",
] as const;

function probe(err: unknown): Probe {
  if (typeof err !== "object" || err === null) return {};
  const fields: Probe = {};
  for (const key of PROBE_KEYS) {
    const value: unknown = Reflect.get(err, key);
    if (value !== undefined) fields[key] = value;
  }
  return fields;
}

function asNumber(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * Classify any caught value. Our own classes first, then discord.js errors,
 * then Node network errors, then unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (err === null || err === undefined) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  if (err instanceof MissingParentError) {
    return { kind: "missing_parent", message: err.message, threadId: err.threadId, cause: err };
  }

  if (err instanceof RemoteApiError) {
    const source = probe(err.cause);
    return {
      kind: "remote_api",
      operation: err.operation,
      channelId: err.channelId,
      code: asNumber(source.code),
      httpStatus: asNumber(source.status) ?? asNumber(source.httpStatus),
      message: err.message,
      cause: err,
    };
  }

  if (err instanceof GatewayTransportError) {
    return { kind: "transport", fatal: err.fatal, code: err.code, message: err.message, cause: err };
  }

  const error = probe(err);
  const message = asString(error.message) ?? String(err);
  const name = asString(error.name);
  const cause = err instanceof Error ? err : undefined;

  // discord.js DiscordAPIError carries the numeric JSON error code
  if (name?.includes("Discord") && typeof error.code === "number") {
    return {
      kind: "discord_api",
      code: error.code,
      httpStatus: asNumber(error.status) ?? asNumber(error.httpStatus),
      method: asString(error.method),
      path: asString(error.url) ?? asString(error.path),
      message,
      cause,
    };
  }

  if (typeof error.code === "string" && NETWORK_CODES.includes(error.code)) {
    return {
      kind: "network",
      code: error.code,
      host: asString(error.hostname) ?? asString(error.host),
      message,
      cause,
    };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

// Missing Access / Missing Permissions: a server setting, not a bug
const PERMISSION_CODES = [50001, 50013];

/**
 * Whether an error is worth a Sentry event. Permission problems and
 * recoverable gateway hiccups are left to the logs.
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "missing_parent":
      return true;

    case "remote_api":
      return err.code === undefined || !PERMISSION_CODES.includes(err.code);

    case "discord_api":
      return !PERMISSION_CODES.includes(err.code);

    case "transport":
      return err.fatal;

    case "network":
      return false;

    case "unknown":
      return true;
  }
}

/**
 * Flatten a classified error into structured log fields.
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base: Record<string, unknown> = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "missing_parent":
      return { ...base, threadId: err.threadId };

    case "remote_api":
      return {
        ...base,
        operation: err.operation,
        channelId: err.channelId,
        discordCode: err.code,
        httpStatus: err.httpStatus,
      };

    case "transport":
      return { ...base, fatal: err.fatal, closeCode: err.code };

    case "discord_api":
      return {
        ...base,
        discordCode: err.code,
        httpStatus: err.httpStatus,
        method: err.method,
        path: err.path,
      };

    case "network":
      return { ...base, networkCode: err.code, host: err.host };

    case "unknown":
      return base;
  }
}
