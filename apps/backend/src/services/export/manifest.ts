import type {
  ExportOpts,
  PreviewPresetName,
  SpriteFilenames,
  SpriteMode,
  TintMap,
} from "@outfit-forge/shared-schema";

export type ManifestArgs = {
  ident: string;
  opts: ExportOpts;
  filenames: SpriteFilenames;
  uiTints: TintMap;
  exportTints: TintMap;
  spriteMode: SpriteMode;
  previewPreset: PreviewPresetName;
  preview: { overlayEnabled: boolean; overlayAboveFront: boolean };
  front: { enabled: boolean; posX: number; posY: number; aboveHand: boolean };
};

/** Machine-readable companion to the config block. */
export type SkinManifest = {
  skin: {
    ident: string;
    name: string;
    lore: string;
    rarity: string | null;
    flags: { noDropOnDeath: boolean; noDrop: boolean; ghillie: boolean };
    obstacleType: string;
    baseScale: number;
  };
  sprites: { mode: SpriteMode; referenceExtension: string; files: SpriteFilenames };
  tints: { ui: TintMap; export: TintMap };
  loot: { borderEnabled: boolean; borderSprite: string | null; innerSprite: string | null; scale: number };
  preview: { preset: PreviewPresetName; overlayEnabled: boolean; overlayAboveFront: boolean };
  front: { enabled: boolean; pos: { x: number; y: number }; aboveHand: boolean };
};

export function manifestData(args: ManifestArgs): SkinManifest {
  const { opts } = args;
  return {
    skin: {
      ident: args.ident,
      name: opts.skin_name,
      lore: opts.lore,
      rarity: opts.rarity,
      flags: {
        noDropOnDeath: opts.no_drop_on_death,
        noDrop: opts.no_drop,
        ghillie: opts.ghillie,
      },
      obstacleType: opts.obstacle_type.trim(),
      baseScale: opts.base_scale,
    },
    sprites: {
      mode: args.spriteMode,
      referenceExtension: opts.ref_ext,
      files: args.filenames,
    },
    tints: { ui: args.uiTints, export: args.exportTints },
    loot: {
      borderEnabled: opts.loot_border_on,
      borderSprite: args.filenames.border ?? null,
      innerSprite: args.filenames.inner ?? null,
      scale: opts.loot_scale,
    },
    preview: {
      preset: args.previewPreset,
      overlayEnabled: args.preview.overlayEnabled,
      overlayAboveFront: args.preview.overlayAboveFront,
    },
    front: {
      enabled: args.front.enabled,
      pos: { x: args.front.posX, y: args.front.posY },
      aboveHand: args.front.aboveHand,
    },
  };
}

export function buildManifest(args: ManifestArgs): string {
  return JSON.stringify(manifestData(args), null, 2);
}
