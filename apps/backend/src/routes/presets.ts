import type { FastifyInstance } from "fastify";
import {
  defaultSkinDraft,
  PREVIEW_PRESET_NAMES,
  type DefaultsResponse,
  type PresetsResponse,
} from "@outfit-forge/shared-schema";
import { DEFAULT_PRESET, PREVIEW_PRESETS } from "../services/preview";

export async function registerPresetRoutes(app: FastifyInstance): Promise<void> {
  app.get("/api/defaults", async (): Promise<DefaultsResponse> => {
    return { draft: defaultSkinDraft };
  });

  app.get("/api/presets", async (): Promise<PresetsResponse> => {
    return {
      presets: PREVIEW_PRESET_NAMES.map((name) => ({ name, description: PREVIEW_PRESETS[name].description })),
      default: DEFAULT_PRESET,
    };
  });
}
