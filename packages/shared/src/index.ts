export type {
  ClusterAction,
  ResourceVersion,
  RawClusterEvent,
  PodEvent,
  WatchStatus,
  WatchSession,
} from "./types/cluster.js";
export type { LifecycleSample, MetricSample, PodLifecycle } from "./types/metrics.js";
