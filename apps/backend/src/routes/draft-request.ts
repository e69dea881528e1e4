import type { FastifyBaseLogger } from "fastify";
import { skinDraftSchema, type SkinDraft } from "@outfit-forge/shared-schema";
import { z } from "zod";
import { config } from "../config";
import { InvalidColorError, UnsupportedAssetError } from "../services/errors";
import { renderSkin, type RenderResult } from "../services/pipeline";
import { serializeError, summarizeDraft } from "../utils/logging";
import { formatZodError } from "../utils/validation";

const draftRequestSchema = z.object({ draft: skinDraftSchema });

export type DraftRenderOutcome =
  | { ok: true; draft: SkinDraft; result: RenderResult }
  | { ok: false; status: 400 | 500; message: string };

/**
 * Validate a `{ draft }` body and run the render pipeline on it. Bad input and
 * unusable uploads come back as 400; anything else is logged and becomes 500.
 */
export function renderDraftRequest(body: unknown, log: FastifyBaseLogger, failure: string): DraftRenderOutcome {
  const parsed = draftRequestSchema.safeParse(body ?? {});
  if (!parsed.success) {
    return { ok: false, status: 400, message: formatZodError(parsed.error) };
  }

  const { draft } = parsed.data;
  try {
    const result = renderSkin(draft, { player: config.playerDir, loot: config.lootDir, exportDir: config.exportDir });
    return { ok: true, draft, result };
  } catch (error) {
    if (error instanceof InvalidColorError || error instanceof UnsupportedAssetError) {
      log.warn({ error: serializeError(error), draft: summarizeDraft(draft) }, failure);
      return { ok: false, status: 400, message: error.message };
    }
    log.error({ error: serializeError(error), draft: summarizeDraft(draft) }, failure);
    return { ok: false, status: 500, message: failure };
  }
}
