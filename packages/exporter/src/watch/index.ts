/**
 * Watch Module
 *
 * Subscribes to the cluster's event stream, keeps the pod events and
 * records them in the metrics registry. Communicates with the cluster
 * through a ClusterEventSource.
 *
 * IMPORTANT: This module must NOT import from or depend on the web
 * framework (Fastify, routes, plugins).
 */

export { EventWatcher, backoffDelay, abortableDelay } from "./event-watcher.js";
export type { EventWatcherOptions, Sleep } from "./event-watcher.js";
export { filterPodEvent, describePodEvent, POD_KIND } from "./pod-event-filter.js";
export { KubernetesEventSource, actionForReason } from "./kubernetes-event-source.js";
export type { KubernetesEventSourceOptions, WatchClient } from "./kubernetes-event-source.js";
export type { ClusterEventSource, StreamOptions, WatchHandlers } from "./event-source.js";
export {
  WatchExpiredError,
  WatchAuthError,
  FatalWatchError,
  classifyWatchError,
  describeError,
} from "./errors.js";
