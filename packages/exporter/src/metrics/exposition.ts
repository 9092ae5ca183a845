/**
 * Prometheus text exposition for the pod metrics registry.
 *
 * Every scrape takes one registry snapshot and renders it through a fresh
 * prom-client Registry, so concurrent scrapes share no mutable state and a
 * key's counter and last-seen gauge always come from the same snapshot.
 * Process metrics (prom-client's defaults) and HTTP request metrics live in
 * long-lived registries that are merged in at render time.
 */

import { Counter, Gauge, Registry, collectDefaultMetrics } from "prom-client";
import type { PodLifecycle } from "@pod-event-exporter/shared";
import type { PodMetricsRegistry } from "./pod-metrics-registry.js";

// ---------------------------------------------------------------------------
// Renderer
// ---------------------------------------------------------------------------

export const DEFAULT_METRICS_PREFIX = "pods_operator";

export interface ExpositionOptions {
  /** Metric name prefix (default: "pods_operator") */
  prefix?: string;
  /** Include prom-client's process and runtime metrics (default: false) */
  defaultMetrics?: boolean;
  /** Long-lived registries merged into every scrape */
  registries?: Registry[];
}

export interface RenderedMetrics {
  contentType: string;
  body: string;
}

export class MetricsRenderer {
  private podMetrics: PodMetricsRegistry;
  private prefix: string;
  private registries: Registry[];

  constructor(podMetrics: PodMetricsRegistry, options?: ExpositionOptions) {
    this.podMetrics = podMetrics;
    this.prefix = options?.prefix ?? DEFAULT_METRICS_PREFIX;
    this.registries = [...(options?.registries ?? [])];
    if (options?.defaultMetrics) {
      const processRegistry = new Registry();
      collectDefaultMetrics({ register: processRegistry, prefix: `${this.prefix}_` });
      this.registries.push(processRegistry);
    }
  }

  /** Name of the per-(pod, action) event counter */
  get counterName(): string {
    return `${this.prefix}_pod_events_total`;
  }

  /** Name of the per-(pod, action) last-seen gauge */
  get lastSeenName(): string {
    return `${this.prefix}_pod_event_last_seen_seconds`;
  }

  /** Name of the per-(pod uid, event time) counter for reason `lifecycle` */
  lifecycleName(lifecycle: PodLifecycle): string {
    return `${this.prefix}_${lifecycle}_pods_total`;
  }

  /** Render the whole exposition body; throws rather than return a partial one */
  async render(): Promise<RenderedMetrics> {
    const samples = this.podMetrics.snapshot();
    const milestones = this.podMetrics.lifecycleSnapshot();

    const registry = new Registry();
    const events = new Counter({
      name: this.counterName,
      help: "Pod lifecycle events observed, by pod and action.",
      labelNames: ["pod", "action"] as const,
      registers: [registry],
    });
    const lastSeen = new Gauge({
      name: this.lastSeenName,
      help: "Unix time of the most recent observation, by pod and action.",
      labelNames: ["pod", "action"] as const,
      registers: [registry],
    });

    const lifecycle: Record<PodLifecycle, Counter<"pod_id" | "event_time">> = {
      created: new Counter({
        name: this.lifecycleName("created"),
        help: "The number of created pods.",
        labelNames: ["pod_id", "event_time"] as const,
        registers: [registry],
      }),
      deleted: new Counter({
        name: this.lifecycleName("deleted"),
        help: "The number of deleted pods.",
        labelNames: ["pod_id", "event_time"] as const,
        registers: [registry],
      }),
    };

    for (const sample of samples) {
      const labels = { pod: sample.pod, action: sample.action };
      events.inc(labels, sample.count);
      lastSeen.set(labels, sample.lastSeen.getTime() / 1000);
    }
    for (const m of milestones) {
      lifecycle[m.lifecycle].inc({ pod_id: m.podId, event_time: m.eventTime }, m.count);
    }

    const output = this.registries.length > 0
      ? Registry.merge([registry, ...this.registries])
      : registry;
    return { contentType: output.contentType, body: await output.metrics() };
  }
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/** One sample line of an exposition body */
export interface ExpositionSample {
  name: string;
  labels: Record<string, string>;
  value: number;
}

export class ExpositionParseError extends Error {
  constructor(
    readonly lineNumber: number,
    readonly line: string,
  ) {
    super(`Malformed exposition line ${lineNumber}: ${line}`);
    this.name = "ExpositionParseError";
  }
}

/**
 * Matches sample lines like:
 * pods_operator_pod_events_total{pod="default/web-1",action="Added"} 3
 *
 * Captures: [1] = metric name, [2] = label block (optional), [3] = value
 */
const SAMPLE_RE =
  /^([a-zA-Z_:][a-zA-Z0-9_:]*)(?:\{(.*)\})?[ \t]+(\S+)(?:[ \t]+-?\d+)?$/;

/** Matches one `name="value"` pair at the start of a label block */
const LABEL_RE = /^([a-zA-Z_][a-zA-Z0-9_]*)="((?:[^"\\]|\\.)*)"\s*(?:,\s*)?/;

/**
 * Parse the sample lines of a Prometheus text body. Comments and blank
 * lines are skipped; any other line that does not follow the grammar
 * throws an ExpositionParseError.
 */
export function parseExposition(text: string): ExpositionSample[] {
  const samples: ExpositionSample[] = [];
  const lines = text.split("\n");

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === "" || line.startsWith("#")) continue;

    const match = SAMPLE_RE.exec(line);
    const labels = match ? parseLabels(match[2] ?? "") : null;
    const value = match ? parseValue(match[3]) : undefined;
    if (!match || !labels || value === undefined) {
      throw new ExpositionParseError(i + 1, line);
    }

    samples.push({ name: match[1], labels, value });
  }

  return samples;
}

function parseLabels(block: string): Record<string, string> | null {
  const labels: Record<string, string> = {};
  let rest = block.trim();
  while (rest.length > 0) {
    const match = LABEL_RE.exec(rest);
    if (!match) return null;
    labels[match[1]] = unescapeLabelValue(match[2]);
    rest = rest.slice(match[0].length);
  }
  return labels;
}

/** Numeric value of a sample, or undefined when it is not a number */
function parseValue(raw: string): number | undefined {
  if (raw === "+Inf") return Infinity;
  if (raw === "-Inf") return -Infinity;
  // prom-client writes NaN as "Nan"
  if (/^nan$/i.test(raw)) return NaN;
  const value = Number(raw);
  return Number.isNaN(value) ? undefined : value;
}

function unescapeLabelValue(raw: string): string {
  return raw.replace(/\\(.)/g, (_m, ch: string) => (ch === "n" ? "\n" : ch));
}
