import type { SkinDraft, SpriteMode, TintMap } from "@outfit-forge/shared-schema";
import { hexToTsHex } from "../color";

export const NEUTRAL_TINT = "0xffffff";

/** Runtime tints as chosen in the UI. */
export function buildTints(draft: SkinDraft): TintMap {
  return {
    base: hexToTsHex(draft.parts.body.tint),
    hand: hexToTsHex(draft.parts.hands.tint),
    foot: hexToTsHex(draft.parts.feet.tint),
    backpack: hexToTsHex(draft.parts.backpack.tint),
    loot: hexToTsHex(draft.loot_tint),
    border: hexToTsHex(draft.meta.loot_border_tint),
  };
}

/**
 * Custom art already carries its colors, so every runtime tint goes neutral.
 * Base mode recolors shared stock art and keeps the chosen tints.
 */
export function adjustTintsForSpriteMode(tints: TintMap, mode: SpriteMode): TintMap {
  if (mode === "base") return { ...tints };
  return {
    base: NEUTRAL_TINT,
    hand: NEUTRAL_TINT,
    foot: NEUTRAL_TINT,
    backpack: NEUTRAL_TINT,
    loot: NEUTRAL_TINT,
    border: NEUTRAL_TINT,
  };
}
