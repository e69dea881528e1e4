import type { OutlineSpec } from "@outfit-forge/shared-schema";
import { darken, lighten } from "../color";
import { f2, strokeAttrs } from "../svg";
import type { ShapeFn } from "./types";

export type OutlineParts = {
  /** Extra `<defs>` (filter or gradient); empty for plain styles. */
  defs: string;
  /** Stroke attribute block for the main shape. */
  attrs: string;
  /** Stroke attributes of a ring drawn behind the main shape (double stroke only). */
  outer: string | null;
};

/** Default stroke used when a builder is called without an outline. */
export function defaultOutline(width: number): OutlineSpec {
  return { color: "#333333", width, style: "solid", glow_color: null, glow_size: null };
}

/**
 * Translate an outline spec into markup pieces. `prefix` scopes the ids of the
 * generated filter/gradient to the part.
 */
export function outlineStyleParts(outline: OutlineSpec, prefix: string): OutlineParts {
  const { color, width } = outline;

  switch (outline.style) {
    case "solid":
      return { defs: "", attrs: strokeAttrs(color, width), outer: null };

    case "glow": {
      const blur = (outline.glow_size ?? width) / 2;
      const glowColor = outline.glow_color ?? color;
      const defs =
        `<defs><filter id="${prefix}-glow" x="-50%" y="-50%" width="200%" height="200%">` +
        `<feGaussianBlur in="SourceGraphic" stdDeviation="${f2(blur)}" result="blur"/>` +
        `<feFlood flood-color="${glowColor}" result="tint"/>` +
        `<feComposite in="tint" in2="blur" operator="in" result="glow"/>` +
        `<feMerge><feMergeNode in="glow"/><feMergeNode in="SourceGraphic"/></feMerge>` +
        `</filter></defs>`;
      return {
        defs,
        attrs: `${strokeAttrs(color, width)} filter="url(#${prefix}-glow)"`,
        outer: null,
      };
    }

    case "gradient": {
      const gradId = `${prefix}-stroke-grad`;
      const defs =
        `<defs><linearGradient id="${gradId}" x1="0%" y1="0%" x2="0%" y2="100%">` +
        `<stop offset="0%" stop-color="${lighten(color, 0.2)}"/>` +
        `<stop offset="100%" stop-color="${darken(color, 0.2)}"/>` +
        `</linearGradient></defs>`;
      return { defs, attrs: `stroke="url(#${gradId})" stroke-width="${width}"`, outer: null };
    }

    case "dashed":
      return {
        defs: "",
        attrs: `${strokeAttrs(color, width)} stroke-dasharray="${f2(width * 1.6)} ${f2(width * 0.9)}"`,
        outer: null,
      };

    case "double_stroke":
      return {
        defs: "",
        attrs: strokeAttrs(color, width),
        outer: strokeAttrs(darken(color, 0.25), width * 1.6),
      };
  }
}

/**
 * Lines for a filled, outlined shape: fill defs, outline defs, the optional outer
 * ring, then the shape itself.
 */
export function strokedShapeLines(
  shape: ShapeFn,
  fillDefs: string,
  fillRef: string,
  outline: OutlineSpec,
  prefix: string,
): string[] {
  const parts = outlineStyleParts(outline, prefix);
  const lines = [fillDefs, parts.defs];
  if (parts.outer) lines.push(shape(`fill="none" ${parts.outer}`));
  lines.push(shape(`fill="${fillRef}" ${parts.attrs}`));
  return lines;
}
