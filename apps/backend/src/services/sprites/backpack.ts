import { svgDocument } from "../svg";
import { defaultOutline, strokedShapeLines } from "./outline";
import type { SpriteBuilder } from "./types";

export const BACKPACK_STROKE_WIDTH = 11.014;

export const backpackSprite: SpriteBuilder = {
  part: "backpack",
  width: 148,
  height: 148,
  render: (fill, _cfg, outline) =>
    svgDocument(
      148,
      148,
      strokedShapeLines(
        (attrs) => `<ellipse cx="74" cy="74" rx="66.5" ry="66.5" ${attrs} />`,
        fill.defs,
        fill.ref,
        outline ?? defaultOutline(BACKPACK_STROKE_WIDTH),
        "backpack",
      ),
    ),
};
