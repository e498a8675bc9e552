import Fastify, { type FastifyServerOptions } from "fastify";
import cookie from "@fastify/cookie";
import cors from "@fastify/cors";
import formbody from "@fastify/formbody";
import { ZodError } from "zod";
import type { AppConfig } from "./config";
import type { AppointmentStore } from "./appointments/store";
import { appointmentsRoutes } from "./routes/appointments";

type BuildAppOptions = {
  config: AppConfig;
  store: AppointmentStore;
  logger?: FastifyServerOptions["logger"];
};

export async function buildApp({ config, store, logger = { level: config.logLevel } }: BuildAppOptions) {
  const app = Fastify({ logger });

  await app.register(cors, { origin: config.corsOrigin, credentials: true });
  await app.register(cookie, { secret: config.sessionSecret });
  await app.register(formbody);

  // Validation errors become 400 instead of 500
  app.setErrorHandler((err, req, reply) => {
    if (err instanceof ZodError) {
      return reply.code(400).send({
        error: "Validation error",
        details: err.issues,
      });
    }
    req.log.error({ err }, "unhandled error");
    return reply.code(500).send({ error: "Internal Server Error" });
  });

  app.get("/health", async () => ({ ok: true }));

  await app.register(appointmentsRoutes, { store, config });

  return app;
}
