import { svgDocument } from "../svg";
import { defaultOutline, strokedShapeLines } from "./outline";
import type { SpriteBuilder } from "./types";

export const FEET_STROKE_WIDTH = 4.513;

export const feetSprite: SpriteBuilder = {
  part: "feet",
  width: 38,
  height: 38,
  render: (fill, _cfg, outline) =>
    svgDocument(
      38,
      38,
      strokedShapeLines(
        (attrs) => `<ellipse cx="19" cy="19" rx="15.7" ry="9.8" ${attrs} />`,
        fill.defs,
        fill.ref,
        outline ?? defaultOutline(FEET_STROKE_WIDTH),
        "feet",
      ),
    ),
};
