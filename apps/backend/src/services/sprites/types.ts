import type { OutlineSpec, PartConfig } from "@outfit-forge/shared-schema";
import type { FillResult } from "../fills";

/**
 * One sprite kind: its fixed nominal canvas and how to draw it from a resolved
 * fill. `render` returns a complete SVG document.
 */
export type SpriteBuilder<C extends PartConfig = PartConfig> = {
  part: string;
  width: number;
  height: number;
  render: (fill: FillResult, cfg: C, outline: OutlineSpec | null) => string;
};

/** Draws one shape with the given fill/stroke attribute block. */
export type ShapeFn = (attrs: string) => string;
