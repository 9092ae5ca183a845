/**
 * Pod Metrics Registry — per (pod, action) delivery counters, each with the
 * time of its most recent observation, plus created/deleted counters per
 * pod uid for the events whose reason marks a lifecycle milestone.
 *
 * Access discipline:
 *  - The watch loop is the only writer (`record`).
 *  - HTTP handlers read through `snapshot()` and `lifecycleSnapshot()`,
 *    once per scrape.
 *  - Each key maps to a frozen entry that `record` replaces as a whole, so
 *    a reader sees the old (count, lastSeen) pair or the new one, never a
 *    mix. All methods are synchronous and cannot interleave.
 *
 * Entries are never evicted; counts only grow for the life of the process.
 *
 * IMPORTANT: Like the watch module, this is independent of the web
 * framework.
 */

import type {
  ClusterAction,
  LifecycleSample,
  MetricSample,
  PodEvent,
  PodLifecycle,
} from "@pod-event-exporter/shared";

/** Order in which actions are listed for the same pod */
const ACTION_ORDER: Record<ClusterAction, number> = {
  Added: 0,
  Modified: 1,
  Deleted: 2,
};

/** Event reasons counted as a pod creation or deletion */
const LIFECYCLE_REASONS: Partial<Record<string, PodLifecycle>> = {
  Created: "created",
  Killing: "deleted",
};

export class PodMetricsRegistry {
  /** Entries keyed by `entryKey(pod, action)` */
  private entries = new Map<string, Readonly<MetricSample>>();
  private lifecycle = new Map<string, Readonly<LifecycleSample>>();

  /**
   * Count one delivery of `event`. Duplicates are not detected: the same
   * event recorded twice counts twice.
   */
  record(event: PodEvent): MetricSample {
    const key = entryKey(event.pod, event.action);
    const prev = this.entries.get(key);
    const next: Readonly<MetricSample> = Object.freeze({
      pod: event.pod,
      action: event.action,
      count: (prev?.count ?? 0) + 1,
      lastSeen: new Date(event.observedAt.getTime()),
    });
    this.entries.set(key, next);

    const milestone = event.reason ? LIFECYCLE_REASONS[event.reason] : undefined;
    if (milestone) this.recordLifecycle(milestone, event.uid ?? "", event.eventTime ?? "");

    return copySample(next);
  }

  /** Current aggregate for one key */
  get(pod: string, action: ClusterAction): MetricSample | undefined {
    const entry = this.entries.get(entryKey(pod, action));
    return entry ? copySample(entry) : undefined;
  }

  /** Point-in-time copy of every key, ordered by pod then action */
  snapshot(): MetricSample[] {
    return Array.from(this.entries.values(), copySample).sort(compareSamples);
  }

  /** Created/deleted counts, ordered by lifecycle, pod uid, then event time */
  lifecycleSnapshot(): LifecycleSample[] {
    return Array.from(this.lifecycle.values(), (s) => ({ ...s })).sort(compareLifecycle);
  }

  /** Number of distinct (pod, action) keys */
  get size(): number {
    return this.entries.size;
  }

  private recordLifecycle(lifecycle: PodLifecycle, podId: string, eventTime: string): void {
    const key = JSON.stringify([lifecycle, podId, eventTime]);
    const prev = this.lifecycle.get(key);
    this.lifecycle.set(
      key,
      Object.freeze({ lifecycle, podId, eventTime, count: (prev?.count ?? 0) + 1 }),
    );
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function entryKey(pod: string, action: ClusterAction): string {
  return JSON.stringify([pod, action]);
}

function copySample(sample: Readonly<MetricSample>): MetricSample {
  return { ...sample, lastSeen: new Date(sample.lastSeen.getTime()) };
}

function compareSamples(a: MetricSample, b: MetricSample): number {
  if (a.pod !== b.pod) return a.pod < b.pod ? -1 : 1;
  return ACTION_ORDER[a.action] - ACTION_ORDER[b.action];
}

function compareLifecycle(a: LifecycleSample, b: LifecycleSample): number {
  const ka = [a.lifecycle, a.podId, a.eventTime];
  const kb = [b.lifecycle, b.podId, b.eventTime];
  for (let i = 0; i < ka.length; i++) {
    if (ka[i] !== kb[i]) return ka[i] < kb[i] ? -1 : 1;
  }
  return 0;
}
