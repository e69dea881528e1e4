import { create } from "zustand";
import {
  defaultSkinDraft,
  type DefaultsResponse,
  type OutlineSpec,
  type PresetSummary,
  type PresetsResponse,
  type RenderResponse,
  type SkinDraft,
  type SpriteMode,
} from "@outfit-forge/shared-schema";
import { apiGet, apiPost, apiPostDownload } from "../lib/api";
import { RENDER_DEBOUNCE_MS } from "../lib/constants";
import { saveBlob } from "../lib/download";
import { useErrorStore } from "./error-store";

export type PartKey = keyof SkinDraft["parts"];
export type OutlinePart = keyof SkinDraft["part_outlines"];
export type SectionKey = "meta" | "outline" | "preview" | "front" | "dirs" | "existing_sprite_ids";

type SkinStore = {
  draft: SkinDraft;
  /** Last successful render of `draft` (or of an earlier draft while a render is in flight). */
  result: RenderResponse | null;
  presets: PresetSummary[];
  loaded: boolean;
  rendering: boolean;
  downloading: boolean;
  error: string | null;

  load: () => Promise<void>;
  render: () => Promise<void>;
  scheduleRender: () => void;

  updateSection: <K extends SectionKey>(key: K, patch: Partial<SkinDraft[K]>) => void;
  updatePart: <K extends PartKey>(part: K, patch: Partial<SkinDraft["parts"][K]>) => void;
  setPartOutline: (part: OutlinePart, outline: OutlineSpec | null) => void;
  setSpriteMode: (mode: SpriteMode) => void;
  setLootTint: (tint: string) => void;
  reset: () => void;

  download: (spritesOnly: boolean) => Promise<void>;
};

/* ---------- Draft helpers ---------- */

export function withSection<K extends SectionKey>(draft: SkinDraft, key: K, patch: Partial<SkinDraft[K]>): SkinDraft {
  const next: SkinDraft = { ...draft };
  next[key] = { ...draft[key], ...patch };
  return next;
}

export function withPart<K extends PartKey>(draft: SkinDraft, part: K, patch: Partial<SkinDraft["parts"][K]>): SkinDraft {
  const parts: SkinDraft["parts"] = { ...draft.parts };
  parts[part] = { ...draft.parts[part], ...patch };
  return { ...draft, parts };
}

/* ---------- Store ---------- */

let renderSeq = 0;
let renderTimer: ReturnType<typeof setTimeout> | null = null;

export const useSkinStore = create<SkinStore>((set, get) => {
  const edit = (next: SkinDraft): void => {
    set({ draft: next });
    get().scheduleRender();
  };

  return {
    draft: defaultSkinDraft,
    result: null,
    presets: [],
    loaded: false,
    rendering: false,
    downloading: false,
    error: null,

    load: async () => {
      try {
        const [defaults, presets] = await Promise.all([
          apiGet<DefaultsResponse>("/api/defaults"),
          apiGet<PresetsResponse>("/api/presets"),
        ]);
        set({ draft: defaults.draft, presets: presets.presets, loaded: true, error: null });
      } catch (e) {
        const msg = e instanceof Error ? e.message : "failed to load defaults";
        set({ loaded: true, error: msg });
        useErrorStore.getState().push("Designer", msg);
        return;
      }
      await get().render();
    },

    render: async () => {
      if (renderTimer !== null) {
        clearTimeout(renderTimer);
        renderTimer = null;
      }
      const seq = ++renderSeq;
      set({ rendering: true });
      try {
        const result = await apiPost<RenderResponse>("/api/render", { draft: get().draft });
        if (seq !== renderSeq) return;
        set({ result, rendering: false, error: null });
      } catch (e) {
        if (seq !== renderSeq) return;
        const msg = e instanceof Error ? e.message : "failed to render skin";
        set({ rendering: false, error: msg });
        useErrorStore.getState().push("Render", msg);
      }
    },

    scheduleRender: () => {
      if (renderTimer !== null) clearTimeout(renderTimer);
      renderTimer = setTimeout(() => {
        renderTimer = null;
        void get().render();
      }, RENDER_DEBOUNCE_MS);
    },

    updateSection: (key, patch) => edit(withSection(get().draft, key, patch)),
    updatePart: (part, patch) => edit(withPart(get().draft, part, patch)),
    setPartOutline: (part, outline) => {
      const partOutlines = { ...get().draft.part_outlines };
      partOutlines[part] = outline;
      edit({ ...get().draft, part_outlines: partOutlines });
    },
    setSpriteMode: (mode) => edit({ ...get().draft, sprite_mode: mode }),
    setLootTint: (tint) => edit({ ...get().draft, loot_tint: tint }),
    reset: () => edit(defaultSkinDraft),

    download: async (spritesOnly) => {
      const base = get().result?.base_id ?? "skin";
      const path = spritesOnly ? "/api/export/sprites" : "/api/export";
      const fallback = spritesOnly ? `${base}_sprites.zip` : `${base}_skin.zip`;
      set({ downloading: true });
      try {
        const file = await apiPostDownload(path, { draft: get().draft }, fallback);
        saveBlob(file.blob, file.filename);
      } catch (e) {
        useErrorStore.getState().push("Export", e instanceof Error ? e.message : "failed to download archive");
      } finally {
        set({ downloading: false });
      }
    },
  };
});
