import type {
  OutlineSpec,
  RenderedSprites,
  RenderResponse,
  SkinDraft,
} from "@outfit-forge/shared-schema";
import {
  adjustTintsForSpriteMode,
  archiveEntries,
  buildConfigBlock,
  buildFilenames,
  buildManifest,
  buildTints,
  skinIdentifiers,
  type SkinBundle,
} from "./export";
import {
  buildPreviewDocument,
  buildPreviewHtml,
  presetLayout,
  resolvePreviewGeometry,
  type FrontPlacement,
} from "./preview";
import {
  accessorySprite,
  backpackSprite,
  bodySprite,
  buildPartSvg,
  feetSprite,
  handsSprite,
  svgBodyPreviewOverlay,
  svgLootCircleInner,
  svgLootCircleOuter,
  svgLootShirt,
} from "./sprites";
import { svgDataUri } from "./svg";

export type RenderDefaults = { player: string; loot: string; exportDir: string };

export type RenderResult = {
  response: RenderResponse;
  bundle: SkinBundle;
};

/* ---------- Helpers ---------- */

function resolveDirs(draft: SkinDraft, defaults: RenderDefaults): { player: string; loot: string } {
  return {
    player: draft.dirs.player.trim() || defaults.player,
    loot: draft.dirs.loot.trim() || defaults.loot,
  };
}

function partOutline(draft: SkinDraft, part: "hands" | "feet" | "backpack"): OutlineSpec {
  return draft.part_outlines[part] ?? draft.outline;
}

function frontSvg(draft: SkinDraft): string | null {
  if (!draft.front.enabled) return null;
  const cfg = draft.front.source === "upload" ? draft.parts.accessory : { ...draft.parts.accessory, upload: null };
  return buildPartSvg(cfg, accessorySprite, draft.outline, "front");
}

function renderSprites(draft: SkinDraft): RenderedSprites {
  const { parts } = draft;
  return {
    body: buildPartSvg(parts.body, bodySprite),
    hands: buildPartSvg(parts.hands, handsSprite, partOutline(draft, "hands")),
    feet: buildPartSvg(parts.feet, feetSprite, partOutline(draft, "feet")),
    backpack: buildPartSvg(parts.backpack, backpackSprite, partOutline(draft, "backpack")),
    loot: svgLootShirt(draft.loot_tint),
    loot_inner: svgLootCircleInner(draft.loot_tint),
    loot_outer: svgLootCircleOuter(draft.meta.loot_border_tint),
    overlay: svgBodyPreviewOverlay(),
    accessory: frontSvg(draft),
  };
}

/* ---------- Pipeline ---------- */

/**
 * One full pass from draft to everything the UI shows and the archive holds.
 * Stateless: the same draft always renders the same result.
 */
export function renderSkin(draft: SkinDraft, defaults: RenderDefaults): RenderResult {
  const sprites = renderSprites(draft);

  const front: FrontPlacement = {
    enabled: sprites.accessory !== null,
    posX: draft.front.pos_x,
    posY: draft.front.pos_y,
    size: draft.front.size,
    rotation: draft.front.rotation,
    aboveHand: draft.front.above_hand,
  };
  const resolved = resolvePreviewGeometry(presetLayout(draft.preview.preset), front, {
    overlayEnabled: draft.preview.overlay_enabled,
    overlayAboveFront: draft.preview.overlay_above_front,
  });
  const previewHtml = buildPreviewHtml(
    {
      backpack: svgDataUri(sprites.backpack),
      body: svgDataUri(sprites.body),
      overlay: svgDataUri(sprites.overlay),
      hands: svgDataUri(sprites.hands),
      feet: svgDataUri(sprites.feet),
      front: sprites.accessory === null ? null : svgDataUri(sprites.accessory),
      loot: svgDataUri(sprites.loot),
      lootInner: svgDataUri(sprites.loot_inner),
      lootOuter: svgDataUri(sprites.loot_outer),
    },
    resolved,
  );

  const { meta } = draft;
  const { ident, baseId } = skinIdentifiers(meta.skin_name);
  const filenames = buildFilenames({
    baseId,
    spriteMode: draft.sprite_mode,
    existingSpriteIds: draft.existing_sprite_ids,
    dirs: resolveDirs(draft, defaults),
    refExt: meta.ref_ext,
    lootBorderOn: meta.loot_border_on,
    lootBorderName: meta.loot_border_name,
    lootInnerName: meta.loot_inner_name,
    frontEnabled: draft.front.enabled,
  });
  const uiTints = buildTints(draft);
  const exportTints = adjustTintsForSpriteMode(uiTints, draft.sprite_mode);
  const configBlock = buildConfigBlock(meta, ident, filenames, uiTints);
  const manifest = buildManifest({
    ident,
    opts: meta,
    filenames,
    uiTints,
    exportTints,
    spriteMode: draft.sprite_mode,
    previewPreset: draft.preview.preset,
    preview: {
      overlayEnabled: draft.preview.overlay_enabled,
      overlayAboveFront: draft.preview.overlay_above_front,
    },
    front: {
      enabled: draft.front.enabled,
      posX: draft.front.pos_x,
      posY: draft.front.pos_y,
      aboveHand: draft.front.above_hand,
    },
  });

  const bundle: SkinBundle = {
    ident,
    baseId,
    filenames,
    svgs: {
      base: sprites.body,
      hands: sprites.hands,
      feet: sprites.feet,
      backpack: sprites.backpack,
      loot: sprites.loot,
      lootInner: sprites.loot_inner,
      lootOuter: sprites.loot_outer,
      front: sprites.accessory,
    },
    lootBorderOn: meta.loot_border_on,
    configBlock,
    manifest,
    previewDocument: draft.preview.include_snapshot
      ? buildPreviewDocument(`${meta.skin_name} preview`, previewHtml)
      : null,
  };

  return {
    response: {
      ok: true,
      ident,
      base_id: baseId,
      sprite_mode: draft.sprite_mode,
      filenames,
      tints: { ui: uiTints, export: exportTints },
      sprites,
      preview_html: previewHtml,
      config_block: configBlock,
      manifest,
      archive_contents: archiveEntries(bundle, { spritesOnly: false, exportDir: defaults.exportDir }).map(([name]) => name),
    },
    bundle,
  };
}
