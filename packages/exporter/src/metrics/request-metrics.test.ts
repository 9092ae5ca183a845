import { describe, it, expect } from "vitest";
import { RequestMetrics } from "./request-metrics.js";
import { parseExposition } from "./exposition.js";

async function samples(metrics: RequestMetrics) {
  return parseExposition(await metrics.registry.metrics());
}

describe("RequestMetrics", () => {
  it("counts requests and observes their latency", async () => {
    const metrics = new RequestMetrics();
    metrics.observe("GET", "/api/pods?limit=5", 200, 12);
    metrics.observe("GET", "/api/pods", 200, 30);
    metrics.observe("DELETE", "/api/pods", 405, 1);

    const all = await samples(metrics);

    expect(all.filter((s) => s.name === "pods_operator_http_requests_total")).toEqual([
      {
        name: "pods_operator_http_requests_total",
        labels: { method: "GET", endpoint: "/api/pods", status: "200" },
        value: 2,
      },
      {
        name: "pods_operator_http_requests_total",
        labels: { method: "DELETE", endpoint: "/api/pods", status: "405" },
        value: 1,
      },
    ]);
    const sum = all.find(
      (s) =>
        s.name === "pods_operator_http_requests_duration_seconds_sum" &&
        s.labels.method === "GET",
    );
    expect(sum?.value).toBeCloseTo(0.042);
  });

  it("skips the ping, metrics and favicon paths", async () => {
    const metrics = new RequestMetrics("cluster");
    for (const url of ["/ping", "/metrics", "/favicon.ico", "/metrics?name[]=x"]) {
      metrics.observe("GET", url, 200, 1);
    }

    expect(await samples(metrics)).toEqual([]);
  });
});
