import type { AccessoryConfig } from "@outfit-forge/shared-schema";
import { f2, strokeAttrs, svgDocument } from "../svg";
import type { SpriteBuilder } from "./types";

const SIZE = 180;
const BASE_RADIUS = 72;

/** Front accessory: flare, base disc and a highlight tip in the extra color. */
export const accessorySprite: SpriteBuilder<AccessoryConfig> = {
  part: "accessory",
  width: SIZE,
  height: SIZE,
  render: (fill, cfg, outline) => {
    const center = SIZE / 2;
    const flareRadius = BASE_RADIUS * cfg.flare_scale;
    const tipRadius = BASE_RADIUS * cfg.tip_scale;
    const tipOffset = BASE_RADIUS * 0.85;
    const stroke = outline ? ` ${strokeAttrs(outline.color, outline.width)}` : "";

    return svgDocument(SIZE, SIZE, [
      fill.defs,
      `<circle cx="${center}" cy="${center}" r="${f2(flareRadius)}" fill="${fill.ref}"${stroke} />`,
      `<circle cx="${center}" cy="${f2(center + 16)}" r="${f2(BASE_RADIUS)}" fill="${fill.ref}"${stroke} />`,
      `<circle cx="${center}" cy="${f2(center - tipOffset)}" r="${f2(tipRadius)}" fill="${cfg.extra}" fill-opacity="0.65" />`,
    ]);
  },
};
