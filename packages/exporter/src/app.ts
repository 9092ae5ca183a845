import Fastify, { type FastifyBaseLogger, type FastifyError } from "fastify";
import { randomUUID } from "node:crypto";

import { MetricsRenderer, type ExpositionOptions } from "./metrics/exposition.js";
import type { PodMetricsRegistry } from "./metrics/pod-metrics-registry.js";
import { RequestMetrics } from "./metrics/request-metrics.js";
import { healthRoutes } from "./routes/health.js";
import { metricsRoutes } from "./routes/metrics.js";

export interface BuildExporterOptions {
  /** Registry the watch loop writes to; only read here */
  podMetrics: PodMetricsRegistry;
  /** Shared process logger, used as Fastify's request logger */
  logger: FastifyBaseLogger;
  metrics?: Pick<ExpositionOptions, "prefix" | "defaultMetrics">;
}

/**
 * Build and configure the metrics HTTP server.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildExporter(opts: BuildExporterOptions) {
  const { podMetrics, logger, metrics } = opts;

  const app = Fastify({
    loggerInstance: logger,
    // Generate unique request IDs for tracing
    genReqId: (req) => {
      const header = req.headers["x-request-id"];
      return typeof header === "string" && header !== "" ? header : randomUUID();
    },
  });

  const requestMetrics = new RequestMetrics(metrics?.prefix);
  const renderer = new MetricsRenderer(podMetrics, {
    ...metrics,
    registries: [requestMetrics.registry],
  });
  app.decorate("metricsRenderer", renderer);

  app.addHook("onResponse", async (request, reply) => {
    requestMetrics.observe(request.method, request.url, reply.statusCode, reply.elapsedTime);
  });

  // ---------------------------------------------------------------------------
  // Error handling: plain-text bodies, never a partial exposition
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).type("text/plain; charset=utf-8").send(error.message);
      return;
    }

    request.log.error({ err: error }, "Request failed");
    reply.status(500).type("text/plain; charset=utf-8").send("Internal server error");
  });

  app.setNotFoundHandler((_request, reply) => {
    reply.status(404).type("text/plain; charset=utf-8").send("Not found");
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------
  await app.register(metricsRoutes);
  await app.register(healthRoutes);

  return app;
}

export type ExporterApp = Awaited<ReturnType<typeof buildExporter>>;
