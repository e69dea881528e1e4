import { svgDocument } from "../svg";
import type { SpriteBuilder } from "./types";

/** Body ellipse. Never stroked: the game applies the tint at runtime. */
export const bodySprite: SpriteBuilder = {
  part: "body",
  width: 140,
  height: 140,
  render: (fill) =>
    svgDocument(140, 140, [fill.defs, `<ellipse cx="70" cy="70" rx="66" ry="66" fill="${fill.ref}" />`]),
};
