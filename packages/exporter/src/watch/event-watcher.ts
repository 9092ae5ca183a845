/**
 * Event Watcher — keeps a watch on the upstream event stream open for the
 * life of the process and feeds every pod event into the metrics registry.
 *
 * Reconnection policy:
 *  - stream closed cleanly → reconnect from the bookmark (after the initial
 *    backoff delay if the session delivered nothing)
 *  - bookmark expired → drop the bookmark and re-list immediately; replayed
 *    events are counted again
 *  - transient failure → reconnect from the bookmark after a capped
 *    exponential backoff
 *  - auth rejection → like a transient failure until `authFailureLimit`
 *    consecutive rejections, then fatal
 *
 * Streaming for at least `backoffResetMs` resets the failure counters.
 * `run()` only settles on `stop()` (resolves) or a fatal error (rejects with
 * FatalWatchError).
 *
 * IMPORTANT: This module must remain independent of the web framework.
 */

import type {
  RawClusterEvent,
  ResourceVersion,
  WatchSession,
  WatchStatus,
} from "@pod-event-exporter/shared";
import type { ClusterEventSource } from "./event-source.js";
import type { PodMetricsRegistry } from "../metrics/pod-metrics-registry.js";
import type { Logger } from "../logger.js";
import { describePodEvent, filterPodEvent } from "./pod-event-filter.js";
import { FatalWatchError, classifyWatchError, describeError } from "./errors.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_INITIAL_BACKOFF_MS = 1_000;
const DEFAULT_MAX_BACKOFF_MS = 30_000;
const DEFAULT_BACKOFF_RESET_MS = 60_000;
const DEFAULT_AUTH_FAILURE_LIMIT = 3;

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface EventWatcherOptions {
  /** First retry delay in ms (default: 1000) */
  initialBackoffMs?: number;
  /** Retry delay cap in ms (default: 30000) */
  maxBackoffMs?: number;
  /** Streaming this long resets the backoff (default: 60000) */
  backoffResetMs?: number;
  /** Give up after this many consecutive failures (default: never) */
  maxRetries?: number;
  /** Give up after this many consecutive auth rejections (default: 3) */
  authFailureLimit?: number;
  logger?: Logger;
  /** Clock for observation times and streaming durations */
  now?: () => Date;
  /** Abortable delay used between reconnects */
  sleep?: Sleep;
}

type FailureKind = "auth" | "transient";

// ---------------------------------------------------------------------------
// EventWatcher
// ---------------------------------------------------------------------------

export class EventWatcher {
  private source: ClusterEventSource;
  private registry: PodMetricsRegistry;
  private initialBackoffMs: number;
  private maxBackoffMs: number;
  private backoffResetMs: number;
  private maxRetries: number | undefined;
  private authFailureLimit: number;
  private log: Logger | undefined;
  private now: () => Date;
  private sleep: Sleep;

  private abortController: AbortController | null = null;
  private session: WatchSession = { status: "Connecting" };
  private consecutiveFailures = 0;
  private consecutiveAuthFailures = 0;

  constructor(
    source: ClusterEventSource,
    registry: PodMetricsRegistry,
    options?: EventWatcherOptions,
  ) {
    this.source = source;
    this.registry = registry;
    this.initialBackoffMs = options?.initialBackoffMs ?? DEFAULT_INITIAL_BACKOFF_MS;
    this.maxBackoffMs = options?.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS;
    this.backoffResetMs = options?.backoffResetMs ?? DEFAULT_BACKOFF_RESET_MS;
    this.maxRetries = options?.maxRetries;
    this.authFailureLimit = options?.authFailureLimit ?? DEFAULT_AUTH_FAILURE_LIMIT;
    this.log = options?.logger;
    this.now = options?.now ?? (() => new Date());
    this.sleep = options?.sleep ?? abortableDelay;
  }

  /** Whether `run()` is active */
  get isRunning(): boolean {
    return this.abortController !== null;
  }

  /** Last resource version processed in the current run */
  get bookmark(): ResourceVersion | undefined {
    return this.session.bookmark;
  }

  get status(): WatchStatus {
    return this.session.status;
  }

  /**
   * Watch until stopped. Resolves after `stop()` (or when `signal` aborts);
   * rejects with FatalWatchError when the loop gives up.
   */
  async run(initialBookmark?: ResourceVersion, signal?: AbortSignal): Promise<void> {
    if (this.abortController) {
      throw new Error("EventWatcher is already running");
    }
    const controller = new AbortController();
    const onExternalAbort = () => controller.abort();
    signal?.addEventListener("abort", onExternalAbort, { once: true });
    if (signal?.aborted) controller.abort();

    this.abortController = controller;
    this.session = { bookmark: initialBookmark || undefined, status: "Connecting" };
    this.consecutiveFailures = 0;
    this.consecutiveAuthFailures = 0;

    try {
      while (!controller.signal.aborted) {
        const delayMs = await this.runSession(controller.signal);
        if (delayMs > 0 && !controller.signal.aborted) {
          await this.sleep(delayMs, controller.signal);
        }
      }
      this.log?.info({ bookmark: this.session.bookmark }, "Watch loop stopped");
    } catch (err) {
      this.setStatus("Failed");
      throw err;
    } finally {
      signal?.removeEventListener("abort", onExternalAbort);
      this.abortController = null;
    }
  }

  /** Close the upstream subscription and make `run()` resolve */
  stop(): void {
    this.abortController?.abort();
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  /** Run one watch session; returns the delay before the next one */
  private async runSession(signal: AbortSignal): Promise<number> {
    this.setStatus("Connecting");
    this.log?.info({ bookmark: this.session.bookmark ?? "latest" }, "Connecting to watch stream");

    const progress: { streamingSince?: number } = {};
    const markStreaming = () => {
      if (progress.streamingSince !== undefined) return;
      progress.streamingSince = this.now().getTime();
      this.setStatus("Streaming");
      this.log?.info("Watch stream established");
    };

    let failure: { error: unknown } | null = null;
    try {
      await this.source.stream(
        { resourceVersion: this.session.bookmark, signal },
        {
          onEvent: (event) => {
            markStreaming();
            this.handleEvent(event);
          },
          onBookmark: (resourceVersion) => {
            markStreaming();
            this.session.bookmark = resourceVersion;
          },
        },
      );
    } catch (error) {
      failure = { error };
    }

    if (signal.aborted) return 0;

    const { streamingSince } = progress;
    if (
      streamingSince !== undefined &&
      this.now().getTime() - streamingSince >= this.backoffResetMs
    ) {
      this.consecutiveFailures = 0;
      this.consecutiveAuthFailures = 0;
    }

    if (!failure) {
      this.log?.info("Watch stream closed, reconnecting");
      // Nothing arrived: wait before reconnecting
      return streamingSince === undefined ? this.initialBackoffMs : 0;
    }

    const kind = classifyWatchError(failure.error);
    if (kind === "expired" && this.session.bookmark !== undefined) {
      this.setStatus("Expired");
      this.log?.warn(
        { bookmark: this.session.bookmark },
        "Watch bookmark expired, re-listing from latest",
      );
      this.session.bookmark = undefined;
      return 0;
    }

    return this.recordFailure(kind === "auth" ? "auth" : "transient", failure.error);
  }

  /** Count a failed session; throws FatalWatchError once a limit is hit */
  private recordFailure(kind: FailureKind, error: unknown): number {
    this.setStatus("Failed");
    this.consecutiveFailures++;

    if (kind === "auth") {
      this.consecutiveAuthFailures++;
      if (this.consecutiveAuthFailures >= this.authFailureLimit) {
        throw new FatalWatchError(
          `Watch authentication rejected ${this.consecutiveAuthFailures} times in a row`,
          { cause: error },
        );
      }
    } else {
      this.consecutiveAuthFailures = 0;
    }

    if (this.maxRetries !== undefined && this.consecutiveFailures > this.maxRetries) {
      throw new FatalWatchError(
        `Watch failed ${this.consecutiveFailures} times in a row (retry limit ${this.maxRetries})`,
        { cause: error },
      );
    }

    const delayMs = backoffDelay(this.consecutiveFailures, this.initialBackoffMs, this.maxBackoffMs);
    this.log?.warn(
      { kind, attempt: this.consecutiveFailures, delayMs, error: describeError(error) },
      "Watch failed, reconnecting after backoff",
    );
    return delayMs;
  }

  /** Advance the bookmark, filter, and record one upstream event */
  private handleEvent(event: RawClusterEvent): void {
    if (event.resourceVersion) this.session.bookmark = event.resourceVersion;

    const podEvent = filterPodEvent(event, { now: this.now, logger: this.log });
    if (!podEvent) return;

    const sample = this.registry.record(podEvent);
    this.log?.info(
      { pod: podEvent.pod, action: podEvent.action, reason: podEvent.reason, count: sample.count },
      describePodEvent(podEvent),
    );
  }

  private setStatus(status: WatchStatus): void {
    this.session.status = status;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Delay before retry number `attempt` (1-based): doubling, capped */
export function backoffDelay(attempt: number, initialMs: number, maxMs: number): number {
  return Math.min(initialMs * 2 ** Math.max(0, attempt - 1), maxMs);
}

/** Wait `ms`, returning early when `signal` aborts */
export function abortableDelay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}
