import "fastify";
import type { MetricsRenderer } from "../metrics/exposition.js";

declare module "fastify" {
  interface FastifyInstance {
    metricsRenderer: MetricsRenderer;
  }
}
