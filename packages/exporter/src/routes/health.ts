import type { FastifyPluginAsync } from "fastify";

/** Liveness probe */
export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get("/ping", async (_request, reply) => {
    return reply.type("text/plain; charset=utf-8").send("pong");
  });
};
