import type { PreviewPresetName } from "@outfit-forge/shared-schema";
import { makeLayout, type PreviewLayout } from "./layout";

export type PreviewPreset = {
  layout: PreviewLayout;
  description: string;
};

export const DEFAULT_PRESET: PreviewPresetName = "Standing";

export const PREVIEW_PRESETS: Readonly<Record<PreviewPresetName, PreviewPreset>> = {
  Loadout: {
    layout: makeLayout({
      stageWidth: 360,
      stageHeight: 420,
      bodySize: 150,
      bodyTop: 156,
      handSize: 60,
      handOffsetX: 70,
      handTop: 282,
      backpackSize: 192,
      backpackTop: 68,
      overlaySize: 200,
      overlayOffsetY: -10,
    }),
    description: "Backpack, armor ring, and helmet aligned like the loadout screen.",
  },
  Standing: {
    layout: makeLayout({
      stageWidth: 300,
      stageHeight: 280,
      bodySize: 140,
      bodyTop: 92,
      handSize: 56,
      handOffsetX: 78,
      handTop: 206,
      showBackpack: false,
      showOverlay: false,
    }),
    description: "Hands and body framing used when a survivor is upright.",
  },
  Knocked: {
    layout: makeLayout({
      stageWidth: 320,
      stageHeight: 320,
      bodySize: 130,
      bodyTop: 118,
      bodyRotation: -28,
      handSize: 50,
      handOffsetX: 34,
      handTop: 222,
      handRotationLeft: -18,
      handRotationRight: 18,
      handsAboveBody: false,
      showBackpack: false,
      showOverlay: false,
      showFeet: true,
      feetSize: 44,
      feetOffsetX: 36,
      feetTop: 244,
      feetRotationLeft: -22,
      feetRotationRight: 22,
      feetAboveBody: false,
    }),
    description: "Top-down knocked pose with limbs tucked under the tilted body.",
  },
};

export function presetLayout(name: PreviewPresetName): PreviewLayout {
  return PREVIEW_PRESETS[name].layout;
}
