/**
 * Types for the pod metrics registry.
 *
 * These describe the per-key aggregates kept in memory by the registry
 * and rendered by the `/metrics` endpoint.
 */

import type { ClusterAction } from "./cluster.js";

/** Pod lifecycle milestones counted per pod uid */
export type PodLifecycle = "created" | "deleted";

/** Aggregate for one (lifecycle, pod uid, event time) key */
export interface LifecycleSample {
  lifecycle: PodLifecycle;
  /** Pod uid; empty when the upstream did not carry one */
  podId: string;
  /** Upstream time of the occurrence; empty when unknown */
  eventTime: string;
  count: number;
}

/** Aggregate for one (pod, action) key */
export interface MetricSample {
  pod: string;
  action: ClusterAction;
  /** Number of deliveries observed; never decreases */
  count: number;
  /** Observation time of the most recent delivery */
  lastSeen: Date;
}
