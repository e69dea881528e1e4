import { InvalidColorError } from "./errors";

export type Rgb = [r: number, g: number, b: number];

const HEX6 = /^#?([0-9a-fA-F]{6})$/;

/** Parse `#RRGGBB` (hash optional). Throws InvalidColorError on anything else. */
export function hexToRgb(hex: string): Rgb {
  const match = HEX6.exec(hex.trim());
  const digits = match?.[1];
  if (!digits) throw new InvalidColorError(hex);
  return [
    parseInt(digits.slice(0, 2), 16),
    parseInt(digits.slice(2, 4), 16),
    parseInt(digits.slice(4, 6), 16),
  ];
}

function byteHex(value: number): string {
  return value.toString(16).padStart(2, "0");
}

/** Render as a TypeScript hex literal: `0xrrggbb`. */
export function rgbToTsHex([r, g, b]: Rgb): string {
  return `0x${byteHex(r)}${byteHex(g)}${byteHex(b)}`;
}

export function rgbToHex([r, g, b]: Rgb): string {
  return `#${byteHex(r)}${byteHex(g)}${byteHex(b)}`;
}

export function hexToTsHex(hex: string): string {
  return rgbToTsHex(hexToRgb(hex));
}

/** Lowercase `#rrggbb` form of any accepted input. */
export function normalizeHex(hex: string): string {
  return rgbToHex(hexToRgb(hex));
}

export function clampByte(value: number): number {
  return Math.max(0, Math.min(255, Math.round(value)));
}

/** Move each channel toward 255 by `amount` (0..1, not enforced). */
export function lighten(hex: string, amount: number): string {
  const [r, g, b] = hexToRgb(hex);
  return rgbToHex([
    clampByte(r + (255 - r) * amount),
    clampByte(g + (255 - g) * amount),
    clampByte(b + (255 - b) * amount),
  ]);
}

/** Move each channel toward 0 by `amount` (0..1, not enforced). */
export function darken(hex: string, amount: number): string {
  const [r, g, b] = hexToRgb(hex);
  return rgbToHex([
    clampByte(r * (1 - amount)),
    clampByte(g * (1 - amount)),
    clampByte(b * (1 - amount)),
  ]);
}
