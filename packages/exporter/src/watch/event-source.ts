/**
 * The upstream contract consumed by the EventWatcher.
 *
 * An event source opens one watch session per `stream()` call. The
 * returned promise:
 *  - resolves when the upstream closes the stream cleanly (or `signal`
 *    is aborted),
 *  - rejects with WatchExpiredError when the bookmark is too old,
 *  - rejects with WatchAuthError on credential rejection,
 *  - rejects with anything else on transient failures.
 *
 * Handlers are called synchronously in delivery order.
 */

import type { RawClusterEvent, ResourceVersion } from "@pod-event-exporter/shared";

export interface WatchHandlers {
  onEvent(event: RawClusterEvent): void;
  /** Upstream progress marker that carries no resource change */
  onBookmark(resourceVersion: ResourceVersion): void;
}

export interface StreamOptions {
  /** Resume after this version; start from "latest" when undefined */
  resourceVersion?: ResourceVersion;
  signal: AbortSignal;
}

export interface ClusterEventSource {
  stream(options: StreamOptions, handlers: WatchHandlers): Promise<void>;
}
