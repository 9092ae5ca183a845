/**
 * Types for the upstream cluster event stream and its pod projection.
 *
 * These are the shapes exchanged between the event source, the pod
 * filter and the metrics registry.
 */

// ---------------------------------------------------------------------------
// Upstream events
// ---------------------------------------------------------------------------

/** Lifecycle action carried by a watch notification */
export type ClusterAction = "Added" | "Modified" | "Deleted";

/** Opaque, session-scoped marker used to resume a watch */
export type ResourceVersion = string;

/** A kind-agnostic notification delivered by the upstream watch */
export interface RawClusterEvent {
  /** Kind of the resource the event concerns, e.g. "Pod" or "ConfigMap" */
  kind: string;
  action: ClusterAction;
  resourceVersion: ResourceVersion;
  /** Raw resource body as delivered; validated only by the consumer */
  body: unknown;
  /** Short machine-readable reason (Kubernetes Event objects carry one) */
  reason?: string;
  /** When the upstream first saw the occurrence, as an ISO 8601 string */
  eventTime?: string;
}

// ---------------------------------------------------------------------------
// Pod projection
// ---------------------------------------------------------------------------

/** A RawClusterEvent known to concern a pod */
export interface PodEvent {
  /** Namespace-qualified pod name, "<namespace>/<name>" */
  pod: string;
  action: ClusterAction;
  /** Process clock reading when the event was filtered */
  observedAt: Date;
  reason?: string;
  /** Platform uid of the pod, when the upstream carries one */
  uid?: string;
  eventTime?: string;
}

// ---------------------------------------------------------------------------
// Watch session
// ---------------------------------------------------------------------------

export type WatchStatus = "Connecting" | "Streaming" | "Expired" | "Failed";

/** State of one upstream connection attempt */
export interface WatchSession {
  bookmark?: ResourceVersion;
  status: WatchStatus;
}
