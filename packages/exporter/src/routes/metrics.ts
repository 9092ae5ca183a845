/**
 * Prometheus scrape endpoint.
 *
 * Reads the pod metrics registry through the renderer; never calls the
 * cluster and never writes to the registry.
 */

import type { FastifyPluginAsync } from "fastify";

export const metricsRoutes: FastifyPluginAsync = async (app) => {
  // -------------------------------------------------------------------------
  // GET /metrics
  // -------------------------------------------------------------------------
  app.get("/metrics", async (_request, reply) => {
    const { contentType, body } = await app.metricsRenderer.render();
    return reply.type(contentType).send(body);
  });
};
