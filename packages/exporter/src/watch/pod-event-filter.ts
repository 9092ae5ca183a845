/**
 * Keeps the upstream events that concern pods and projects them onto
 * PodEvent.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { PodEvent, RawClusterEvent } from "@pod-event-exporter/shared";
import type { Logger } from "../logger.js";

export const POD_KIND = "Pod";

/** The part of a pod body the filter needs */
export const PodBody = Type.Object({
  metadata: Type.Object({
    namespace: Type.String({ minLength: 1 }),
    name: Type.String({ minLength: 1 }),
    uid: Type.Optional(Type.String()),
  }),
});

export type PodBody = Static<typeof PodBody>;

export interface PodEventFilterOptions {
  /** Clock used for `observedAt` (default: `new Date()`) */
  now?: () => Date;
  /** Receives a warning for each discarded malformed pod body */
  logger?: Logger;
}

/**
 * Project `event` onto a PodEvent, or return undefined when it does not
 * concern a pod. A pod event whose body lacks a namespace or name is
 * discarded with a warning; this function never throws.
 */
export function filterPodEvent(
  event: RawClusterEvent,
  options: PodEventFilterOptions = {},
): PodEvent | undefined {
  if (event.kind !== POD_KIND) return undefined;

  if (!Value.Check(PodBody, event.body)) {
    const firstError = Value.Errors(PodBody, event.body).First();
    options.logger?.warn(
      {
        action: event.action,
        resourceVersion: event.resourceVersion,
        problem: firstError ? `${firstError.path || "body"}: ${firstError.message}` : "invalid body",
      },
      "Discarding pod event with malformed body",
    );
    return undefined;
  }

  const { namespace, name, uid } = event.body.metadata;
  const podEvent: PodEvent = {
    pod: `${namespace}/${name}`,
    action: event.action,
    observedAt: options.now?.() ?? new Date(),
  };
  if (event.reason) podEvent.reason = event.reason;
  if (uid) podEvent.uid = uid;
  if (event.eventTime) podEvent.eventTime = event.eventTime;
  return podEvent;
}

/** Log message for a recorded pod event, phrased after its reason when known */
export function describePodEvent(event: PodEvent): string {
  switch (event.reason) {
    case "Created":
      return `Pod ${event.pod} created`;
    case "Scheduled":
      return `Pod ${event.pod} scheduled`;
    case "Started":
      return `Pod ${event.pod} allocated and started`;
    case "Pulled":
      return `Image for pod ${event.pod} pulled`;
    case "Updated":
      return `Pod ${event.pod} updated`;
    case "Killing":
      return `Killing pod ${event.pod}`;
    default:
      return `Pod ${event.pod} ${event.action.toLowerCase()}`;
  }
}
