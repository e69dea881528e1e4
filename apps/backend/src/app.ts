import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { config } from "./config";
import { registerExportRoutes } from "./routes/export";
import { registerPresetRoutes } from "./routes/presets";
import { registerRenderRoutes } from "./routes/render";

export type BuildAppOptions = {
  /** `false` silences the request logger (tests). */
  logger?: boolean;
};

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel },
    bodyLimit: config.bodyLimitBytes,
  });

  await app.register(cors, {
    origin: config.corsOrigin || true,
    methods: ["GET", "POST", "OPTIONS"],
    exposedHeaders: ["content-disposition"],
  });

  app.get("/api/health", async () => ({ ok: true }));

  await registerPresetRoutes(app);
  await registerRenderRoutes(app);
  await registerExportRoutes(app);

  return app;
}
