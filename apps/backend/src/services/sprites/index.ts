import type { OutlineSpec, PartConfig } from "@outfit-forge/shared-schema";
import { buildFill } from "../fills";
import type { SpriteBuilder } from "./types";
import { svgFromUpload } from "./upload";

export { accessorySprite } from "./accessory";
export { backpackSprite, BACKPACK_STROKE_WIDTH } from "./backpack";
export { bodySprite } from "./body";
export { feetSprite, FEET_STROKE_WIDTH } from "./feet";
export { handShape, handsSprite, HANDS_STROKE_WIDTH } from "./hands";
export {
  svgLootCircleInner,
  svgLootCircleOuter,
  svgLootShirt,
  LOOT_ICON_SIZE,
  LOOT_INNER_SIZE,
  LOOT_OUTER_SIZE,
} from "./loot";
export { svgBodyPreviewOverlay, OVERLAY_SIZE } from "./overlay";
export { defaultOutline, outlineStyleParts, strokedShapeLines } from "./outline";
export type { OutlineParts } from "./outline";
export { assertSupportedAsset, svgFromUpload } from "./upload";
export type { ShapeFn, SpriteBuilder } from "./types";

/**
 * Fill → sprite for one part. An uploaded image, when present, replaces the
 * generated art at the builder's canvas size.
 */
export function buildPartSvg<C extends PartConfig>(
  cfg: C,
  builder: SpriteBuilder<C>,
  outline: OutlineSpec | null = null,
  idPrefix: string = builder.part,
): string {
  if (cfg.upload) {
    const bytes = Buffer.from(cfg.upload.data, "base64");
    return svgFromUpload(bytes, cfg.upload.mime, builder.width, builder.height, cfg.upload.rotation, cfg.upload.scale);
  }
  const fill = buildFill(
    {
      style: cfg.style,
      primary: cfg.primary,
      secondary: cfg.secondary,
      extra: cfg.extra,
      angle: cfg.angle,
      gap: cfg.gap,
      opacity: cfg.opacity,
      size: cfg.size,
    },
    idPrefix,
  );
  return builder.render(fill, cfg, outline);
}
