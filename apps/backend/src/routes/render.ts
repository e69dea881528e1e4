import type { FastifyInstance } from "fastify";
import { renderDraftRequest } from "./draft-request";

export async function registerRenderRoutes(app: FastifyInstance): Promise<void> {
  app.post("/api/render", async (request, reply) => {
    const outcome = renderDraftRequest(request.body, request.log, "failed to render skin");
    if (!outcome.ok) {
      reply.code(outcome.status);
      return { ok: false, message: outcome.message };
    }
    return outcome.result.response;
  });
}
