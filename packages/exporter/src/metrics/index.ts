/**
 * Metrics Module
 *
 * Keeps per-pod event counters in memory and renders them in the
 * Prometheus text format for the `/metrics` endpoint.
 */

export { PodMetricsRegistry } from "./pod-metrics-registry.js";
export { MetricsRenderer, parseExposition, ExpositionParseError, DEFAULT_METRICS_PREFIX } from "./exposition.js";
export type { ExpositionOptions, ExpositionSample, RenderedMetrics } from "./exposition.js";
export { RequestMetrics, UNTRACKED_PATHS } from "./request-metrics.js";
