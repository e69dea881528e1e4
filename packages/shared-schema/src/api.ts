import type { PreviewPresetName, SkinDraft, SpriteMode } from "./skin";

/** Logical sprite slots that end up as files. */
export type SpriteSlot = "base" | "hands" | "feet" | "backpack" | "loot" | "border" | "inner" | "front";

/** Slot → filename. Optional slots are absent when not exported. */
export type SpriteFilenames = {
  base: string;
  hands: string;
  feet: string;
  backpack: string;
  loot: string;
  border?: string;
  inner?: string;
  front?: string;
};

export type TintKey = "base" | "hand" | "foot" | "backpack" | "loot" | "border";

/** Tint key → `0xRRGGBB` literal. */
export type TintMap = Record<TintKey, string>;

export type RenderedSprites = {
  body: string;
  hands: string;
  feet: string;
  backpack: string;
  loot: string;
  loot_inner: string;
  loot_outer: string;
  overlay: string;
  accessory: string | null;
};

export type RenderResponse = {
  ok: true;
  ident: string;
  base_id: string;
  sprite_mode: SpriteMode;
  filenames: SpriteFilenames;
  tints: { ui: TintMap; export: TintMap };
  sprites: RenderedSprites;
  preview_html: string;
  config_block: string;
  manifest: string;
  /** Entry names of the full archive, in write order. */
  archive_contents: string[];
};

export type ApiErrorResponse = {
  ok: false;
  message: string;
};

export type PresetSummary = {
  name: PreviewPresetName;
  description: string;
};

export type PresetsResponse = {
  presets: PresetSummary[];
  default: PreviewPresetName;
};

export type DefaultsResponse = {
  draft: SkinDraft;
};
