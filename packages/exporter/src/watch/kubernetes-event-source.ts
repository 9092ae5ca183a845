/**
 * Kubernetes event source: watches core/v1 Event objects and turns each
 * new or repeated Event into a RawClusterEvent about its involved object.
 *
 * The watch type says what happened to the Event record, not to the pod:
 * a deleted pod shows up as an ADDED "Killing" Event, and DELETED only
 * means an old Event was garbage-collected. The action is therefore read
 * from the Event's reason, and DELETED notifications only move the
 * bookmark.
 *
 * One `stream()` call is one watch request. The API server ends it after
 * `timeoutSeconds`, reports an expired bookmark as an ERROR notification
 * with status 410, and rejects bad credentials with 401/403.
 */

import * as k8s from "@kubernetes/client-node";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { ClusterAction, RawClusterEvent } from "@pod-event-exporter/shared";
import type { ClusterEventSource, StreamOptions, WatchHandlers } from "./event-source.js";
import { WatchAuthError, WatchExpiredError } from "./errors.js";

// ---------------------------------------------------------------------------
// Wire shapes
// ---------------------------------------------------------------------------

/** The fields of a core/v1 Event we read; everything else is ignored */
const KubeEventObject = Type.Object({
  metadata: Type.Optional(
    Type.Object({ resourceVersion: Type.Optional(Type.String()) }),
  ),
  involvedObject: Type.Optional(
    Type.Object({
      kind: Type.Optional(Type.String()),
      namespace: Type.Optional(Type.String()),
      name: Type.Optional(Type.String()),
      uid: Type.Optional(Type.String()),
    }),
  ),
  reason: Type.Optional(Type.String()),
  // Null on Events recorded through events.k8s.io
  firstTimestamp: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  eventTime: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

type KubeEventObject = Static<typeof KubeEventObject>;

/** meta/v1 Status, as sent in ERROR notifications */
const KubeStatus = Type.Object({
  code: Type.Optional(Type.Number()),
  reason: Type.Optional(Type.String()),
  message: Type.Optional(Type.String()),
});

type KubeStatus = Static<typeof KubeStatus>;

/** Event reasons that mark a pod's creation or removal */
const REASON_ACTIONS: Partial<Record<string, ClusterAction>> = {
  Scheduled: "Added",
  Created: "Added",
  Killing: "Deleted",
};

/** The part of `k8s.Watch` we use */
export type WatchClient = Pick<k8s.Watch, "watch">;

export interface KubernetesEventSourceOptions {
  /** Watch a single namespace instead of the whole cluster */
  namespace?: string;
  /** Server-side timeout for one watch request (default: 300) */
  timeoutSeconds?: number;
}

const DEFAULT_TIMEOUT_SECONDS = 300;

// ---------------------------------------------------------------------------
// KubernetesEventSource
// ---------------------------------------------------------------------------

export class KubernetesEventSource implements ClusterEventSource {
  private watch: WatchClient;
  private path: string;
  private timeoutSeconds: number;

  constructor(watch: WatchClient, options?: KubernetesEventSourceOptions) {
    this.watch = watch;
    this.path = options?.namespace
      ? `/api/v1/namespaces/${encodeURIComponent(options.namespace)}/events`
      : "/api/v1/events";
    this.timeoutSeconds = options?.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
  }

  static fromKubeConfig(
    kubeConfig: k8s.KubeConfig,
    options?: KubernetesEventSourceOptions,
  ): KubernetesEventSource {
    return new KubernetesEventSource(new k8s.Watch(kubeConfig), options);
  }

  /** Watch request path (cluster-wide or namespaced) */
  get watchPath(): string {
    return this.path;
  }

  stream({ resourceVersion, signal }: StreamOptions, handlers: WatchHandlers): Promise<void> {
    if (signal.aborted) return Promise.resolve();

    const query: Record<string, string | number | boolean | undefined> = {
      allowWatchBookmarks: true,
      timeoutSeconds: this.timeoutSeconds,
    };
    if (resourceVersion !== undefined) query.resourceVersion = resourceVersion;

    return new Promise<void>((resolve, reject) => {
      let controller: AbortController | undefined;
      let settled = false;

      const settle = (err?: unknown) => {
        if (settled) return;
        settled = true;
        signal.removeEventListener("abort", onAbort);
        controller?.abort();
        // An abort we asked for surfaces as an error from the HTTP client
        if (err === undefined || err === null || signal.aborted) resolve();
        else reject(err);
      };
      const onAbort = () => settle();
      signal.addEventListener("abort", onAbort, { once: true });

      void this.watch
        .watch(
          this.path,
          query,
          (phase: string, apiObj: unknown) => {
            if (settled) return;
            try {
              dispatch(phase, apiObj, handlers);
            } catch (err) {
              settle(err);
            }
          },
          (err: unknown) => settle(err),
        )
        .then((c) => {
          controller = c;
          if (settled) c.abort();
        }, settle);
    });
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Route one watch notification to the handlers; throws on ERROR */
function dispatch(phase: string, apiObj: unknown, handlers: WatchHandlers): void {
  switch (phase) {
    case "ADDED":
    case "MODIFIED":
      handlers.onEvent(toRawEvent(apiObj));
      return;
    case "DELETED":
    case "BOOKMARK": {
      const rv = Value.Check(KubeEventObject, apiObj) ? apiObj.metadata?.resourceVersion : undefined;
      if (rv) handlers.onBookmark(rv);
      return;
    }
    case "ERROR":
      throw statusError(apiObj);
  }
}

/** Pod action an Event reason stands for; any other reason is an update */
export function actionForReason(reason: string | undefined): ClusterAction {
  if (!reason) return "Modified";
  return REASON_ACTIONS[reason] ?? "Modified";
}

/** Map a core/v1 Event onto a RawClusterEvent about its involved object */
export function toRawEvent(apiObj: unknown): RawClusterEvent {
  const obj: KubeEventObject = Value.Check(KubeEventObject, apiObj) ? apiObj : {};
  const involved = obj.involvedObject;
  const event: RawClusterEvent = {
    kind: involved?.kind ?? "",
    action: actionForReason(obj.reason),
    resourceVersion: obj.metadata?.resourceVersion ?? "",
    body: {
      metadata: {
        namespace: involved?.namespace,
        name: involved?.name,
        uid: involved?.uid,
      },
    },
  };
  if (obj.reason) event.reason = obj.reason;
  const eventTime = isoTime(obj.firstTimestamp ?? obj.eventTime);
  if (eventTime) event.eventTime = eventTime;
  return event;
}

/** Normalise an API timestamp (RFC 3339, up to microseconds) to ISO 8601 with milliseconds */
function isoTime(raw: string | null | undefined): string | undefined {
  if (!raw) return undefined;
  const ms = Date.parse(raw.replace(/(\.\d{3})\d+/, "$1"));
  return Number.isNaN(ms) ? undefined : new Date(ms).toISOString();
}

/** Turn the Status object of an ERROR notification into an error */
export function statusError(apiObj: unknown): Error {
  const status: KubeStatus = Value.Check(KubeStatus, apiObj) ? apiObj : {};
  const message = status.message ?? `Watch error${status.reason ? `: ${status.reason}` : ""}`;
  if (status.code === 410 || status.reason === "Expired" || status.reason === "Gone") {
    return new WatchExpiredError(message);
  }
  if (status.code === 401 || status.code === 403) {
    return new WatchAuthError(status.code, message);
  }
  return new Error(message);
}
