import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { config } from "../config";
import { archiveName, buildSkinArchive } from "../services/export";
import { serializeError } from "../utils/logging";
import { renderDraftRequest } from "./draft-request";

export async function registerExportRoutes(app: FastifyInstance): Promise<void> {
  const sendArchive = async (request: FastifyRequest, reply: FastifyReply, spritesOnly: boolean) => {
    const outcome = renderDraftRequest(request.body, request.log, "failed to build archive");
    if (!outcome.ok) {
      reply.code(outcome.status);
      return { ok: false, message: outcome.message };
    }

    const { bundle } = outcome.result;
    try {
      const zip = await buildSkinArchive(bundle, { spritesOnly, exportDir: config.exportDir });
      const filename = archiveName(bundle.baseId, spritesOnly);
      request.log.info({ ident: bundle.ident, filename, bytes: zip.length }, "archive built");
      return reply
        .header("content-type", "application/zip")
        .header("content-disposition", `attachment; filename="${filename}"`)
        .send(zip);
    } catch (error) {
      request.log.error({ error: serializeError(error), ident: bundle.ident }, "failed to zip archive");
      reply.code(500);
      return { ok: false, message: "failed to build archive" };
    }
  };

  app.post("/api/export", async (request, reply) => sendArchive(request, reply, false));
  app.post("/api/export/sprites", async (request, reply) => sendArchive(request, reply, true));
}
