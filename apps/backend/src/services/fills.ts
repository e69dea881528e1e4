import type { FillStyle } from "@outfit-forge/shared-schema";

export type FillParams = {
  style: FillStyle;
  primary: string;
  secondary: string;
  extra: string;
  angle: number;
  gap: number;
  opacity: number;
  size: number;
};

/** `defs` markup (possibly empty) plus the value to put in a `fill` attribute. */
export type FillResult = {
  defs: string;
  ref: string;
};

export function defLinearGrad(id: string, colorA: string, colorB: string, angle = 45): string {
  return (
    `<defs><linearGradient id="${id}" gradientUnits="userSpaceOnUse" ` +
    `x1="0" y1="0" x2="512" y2="0" gradientTransform="rotate(${angle} 256 256)">` +
    `<stop offset="0%" stop-color="${colorA}"/>` +
    `<stop offset="100%" stop-color="${colorB}"/>` +
    `</linearGradient></defs>`
  );
}

export function defRadialGrad(id: string, colorA: string, colorB: string): string {
  return (
    `<defs><radialGradient id="${id}" cx="50%" cy="45%" r="60%">` +
    `<stop offset="0%" stop-color="${colorA}"/>` +
    `<stop offset="100%" stop-color="${colorB}"/>` +
    `</radialGradient></defs>`
  );
}

export function defStripes(
  id: string,
  base: string,
  stripe: string,
  gap = 16,
  angle = 45,
  opacity = 0.6,
): string {
  return (
    `<defs><pattern id="${id}" patternUnits="userSpaceOnUse" width="${gap * 2}" height="${gap * 2}" ` +
    `patternTransform="rotate(${angle})">` +
    `<rect width="100%" height="100%" fill="${base}"/>` +
    `<rect x="0" y="0" width="${gap}" height="100%" fill="${stripe}" opacity="${opacity}"/>` +
    `</pattern></defs>`
  );
}

export function defCrosshatch(id: string, base: string, stripe: string, gap = 16, opacity = 0.6): string {
  return (
    `<defs><pattern id="${id}" patternUnits="userSpaceOnUse" width="${gap}" height="${gap}">` +
    `<rect width="100%" height="100%" fill="${base}"/>` +
    `<path d="M0,0 L${gap},0 M0,0 L0,${gap}" stroke="${stripe}" stroke-width="${gap / 2}" opacity="${opacity}"/>` +
    `</pattern></defs>`
  );
}

export function defDots(id: string, base: string, dot = "#000", size = 6, gap = 22, opacity = 0.6): string {
  return (
    `<defs><pattern id="${id}" patternUnits="userSpaceOnUse" width="${gap}" height="${gap}">` +
    `<rect width="100%" height="100%" fill="${base}"/>` +
    `<circle cx="${gap / 2}" cy="${gap / 2}" r="${size}" fill="${dot}" opacity="${opacity}"/>` +
    `</pattern></defs>`
  );
}

export function defChecker(id: string, colorA: string, colorB: string, size = 16): string {
  return (
    `<defs><pattern id="${id}" patternUnits="userSpaceOnUse" width="${2 * size}" height="${2 * size}">` +
    `<rect width="${2 * size}" height="${2 * size}" fill="${colorA}"/>` +
    `<rect x="${size}" y="0" width="${size}" height="${size}" fill="${colorB}"/>` +
    `<rect x="0" y="${size}" width="${size}" height="${size}" fill="${colorB}"/>` +
    `</pattern></defs>`
  );
}

/**
 * Build the fill for one part. Definition ids are `{idPrefix}-{short}` so several
 * parts can be inlined into a single document without colliding.
 */
export function buildFill(params: FillParams, idPrefix = "fill"): FillResult {
  const { style, primary, secondary, extra, angle, gap, opacity, size } = params;
  const id = (short: string): string => `${idPrefix}-${short}`;
  const withRef = (short: string, defs: string): FillResult => ({ defs, ref: `url(#${id(short)})` });

  switch (style) {
    case "solid":
      return { defs: "", ref: primary };
    case "linear_gradient":
      return withRef("lg", defLinearGrad(id("lg"), primary, secondary, angle));
    case "radial_gradient":
      return withRef("rg", defRadialGrad(id("rg"), primary, secondary));
    case "diagonal_stripes":
      return withRef("ds", defStripes(id("ds"), primary, extra, gap, angle, opacity));
    case "horizontal_stripes":
      return withRef("hs", defStripes(id("hs"), primary, extra, gap, 0, opacity));
    case "vertical_stripes":
      return withRef("vs", defStripes(id("vs"), primary, extra, gap, 90, opacity));
    case "crosshatch":
      return withRef("ch", defCrosshatch(id("ch"), primary, extra, gap, opacity));
    case "dots":
      return withRef("pd", defDots(id("pd"), primary, extra, size, gap, opacity));
    case "checker":
      return withRef("ck", defChecker(id("ck"), primary, secondary, size));
  }
}
