// src/routes/health.ts

import type { FastifyInstance } from "fastify";
import type { SessionRepository } from "../state/session.repository.js";

export interface HealthRouteOptions {
  repository: SessionRepository;
}

export default async function healthRoute(app: FastifyInstance, opts: HealthRouteOptions) {
  app.get("/health", async (req, reply) => {
    const start = Date.now();
    const timestamp = new Date().toISOString();

    let sessionsOk = false;
    let latencyMs: number | null = null;

    try {
      await opts.repository.ping();
      sessionsOk = true;
      latencyMs = Date.now() - start;
    } catch (err) {
      req.log.error({ err }, "Session store health check failed");
    }

    return reply.status(sessionsOk ? 200 : 503).send({
      status: sessionsOk ? "UP" : "DOWN",
      service: "chunkup-api-v1",
      ready: sessionsOk,
      timestamp,
      checks: {
        sessions: {
          ok: sessionsOk,
          latencyMs,
          timestamp,
        },
      },
    });
  });
}
