/**
 * Error taxonomy for the upstream watch.
 *
 *  - WatchExpiredError: the bookmark is too old; resume with a full re-list.
 *  - WatchAuthError: the platform rejected our credentials (401/403).
 *  - FatalWatchError: the watch loop gave up; surfaced to the supervisor.
 *
 * Anything else coming out of the event source is treated as transient.
 */

export class WatchExpiredError extends Error {
  constructor(message = "Watch bookmark expired") {
    super(message);
    this.name = "WatchExpiredError";
  }
}

export class WatchAuthError extends Error {
  constructor(
    readonly statusCode: number,
    message = `Watch request rejected with status ${statusCode}`,
  ) {
    super(message);
    this.name = "WatchAuthError";
  }
}

export class FatalWatchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FatalWatchError";
  }
}

export type WatchFailureKind = "expired" | "auth" | "transient";

/** HTTP status codes meaning the watch cannot resume from its bookmark */
const EXPIRED_STATUS = 410;
const AUTH_STATUSES = new Set([401, 403]);

/** Sort an error raised by an event source into the taxonomy above */
export function classifyWatchError(err: unknown): WatchFailureKind {
  if (err instanceof WatchExpiredError) return "expired";
  if (err instanceof WatchAuthError) return "auth";

  const status = statusCodeOf(err);
  if (status === EXPIRED_STATUS) return "expired";
  if (status !== undefined && AUTH_STATUSES.has(status)) return "auth";
  return "transient";
}

/** Status code carried by an HTTP client error, if any */
export function statusCodeOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  for (const field of ["statusCode", "code"] as const) {
    if (field in err) {
      const value: unknown = Reflect.get(err, field);
      if (typeof value === "number") return value;
    }
  }
  return undefined;
}

/** Render an unknown thrown value for a log line */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
