import type { HandsConfig } from "@outfit-forge/shared-schema";
import { f2, svgDocument } from "../svg";
import { defaultOutline, strokedShapeLines } from "./outline";
import type { ShapeFn, SpriteBuilder } from "./types";

export const HANDS_STROKE_WIDTH = 11.096;

const CX = 38;
const CY = 38;

/** Silhouette for the selected hand shape, scaled around the canvas center. */
export function handShape(cfg: HandsConfig): ShapeFn {
  const sx = cfg.shape_scale_x;
  const sy = cfg.shape_scale_y;

  switch (cfg.shape) {
    case "rounded_square": {
      const size = 48 * sx;
      const radius = 12 * sy;
      const x = CX - size / 2;
      const y = CY - size / 2;
      return (attrs) =>
        `<rect x="${f2(x)}" y="${f2(y)}" width="${f2(size)}" height="${f2(size)}" ` +
        `rx="${f2(radius)}" ry="${f2(radius)}" ${attrs} />`;
    }
    case "diamond": {
      const halfW = 28 * sx;
      const halfH = 32 * sy;
      const corners: Array<[number, number]> = [
        [CX, CY - halfH],
        [CX + halfW, CY],
        [CX, CY + halfH],
        [CX - halfW, CY],
      ];
      const points = corners.map(([px, py]) => `${f2(px)},${f2(py)}`).join(" ");
      return (attrs) => `<polygon points="${points}" ${attrs} />`;
    }
    case "teardrop": {
      const radius = 30 * Math.min(sx, sy);
      const tip = 26 * sy;
      const d =
        `M ${f2(CX - radius)} ${f2(CY)} ` +
        `A ${f2(radius)} ${f2(radius)} 0 1 1 ${f2(CX + radius)} ${f2(CY)} ` +
        `L ${f2(CX)} ${f2(CY + tip)} Z`;
      return (attrs) => `<path d="${d}" ${attrs} />`;
    }
    case "circle":
      return (attrs) =>
        `<ellipse cx="${CX}" cy="${CY}" rx="${f2(30.4 * sx)}" ry="${f2(30.4 * sy)}" ${attrs} />`;
  }
}

export const handsSprite: SpriteBuilder<HandsConfig> = {
  part: "hands",
  width: 76,
  height: 76,
  render: (fill, cfg, outline) =>
    svgDocument(
      76,
      76,
      strokedShapeLines(handShape(cfg), fill.defs, fill.ref, outline ?? defaultOutline(HANDS_STROKE_WIDTH), "hands"),
    ),
};
