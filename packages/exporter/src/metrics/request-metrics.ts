import { Counter, Histogram, Registry } from "prom-client";
import { DEFAULT_METRICS_PREFIX } from "./exposition.js";

/** Health, scrape and favicon paths, left out of the request metrics */
export const UNTRACKED_PATHS: ReadonlySet<string> = new Set(["/ping", "/metrics", "/favicon.ico"]);

type RequestLabel = "method" | "endpoint" | "status";

/**
 * Per-route HTTP request counts and latencies of the exporter itself,
 * kept in a long-lived registry for the renderer to merge in.
 */
export class RequestMetrics {
  readonly registry = new Registry();
  private requests: Counter<RequestLabel>;
  private duration: Histogram<RequestLabel>;

  constructor(prefix = DEFAULT_METRICS_PREFIX) {
    this.requests = new Counter({
      name: `${prefix}_http_requests_total`,
      help: "HTTP requests handled, by method, endpoint and status.",
      labelNames: ["method", "endpoint", "status"] as const,
      registers: [this.registry],
    });
    this.duration = new Histogram({
      name: `${prefix}_http_requests_duration_seconds`,
      help: "HTTP request latency in seconds, by method, endpoint and status.",
      labelNames: ["method", "endpoint", "status"] as const,
      registers: [this.registry],
    });
  }

  /** Count one finished request; `url` may carry a query string */
  observe(method: string, url: string, statusCode: number, elapsedMs: number): void {
    const endpoint = url.split("?")[0];
    if (UNTRACKED_PATHS.has(endpoint)) return;

    const labels = { method, endpoint, status: String(statusCode) };
    this.requests.inc(labels);
    this.duration.observe(labels, elapsedMs / 1000);
  }
}
