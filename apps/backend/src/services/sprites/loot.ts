import { darken, lighten } from "../color";
import { svgDocument } from "../svg";

/* Silhouette of the stock loot shirt. Only the fill changes per skin. */
const LOOT_SHIRT_PATH =
  "M63.993 8.15c-10.38 0-22.796 3.526-30.355 7.22-8.038 3.266-14.581 7.287-19.253 14.509C8.102 " +
  "39.594 5.051 54.6 7.13 78.482c5.964 2.07 11.333 1.45 16.842-.415-1.727-7.884-1.448-15.764.496-22.204 " +
  "2.126-7.044 6.404-12.722 12.675-13.701l2.77-.432.074 2.803c.054 2.043.09 4.17.116 6.335l.027 " +
  "6.312c-.037 8.798-.382 18.286-1.277 27.845 5.637 1.831 14.806 2.954 23.964 3.019l4.597-.058c8.53-.275 " +
  "16.742-1.449 21.665-3.063-1.093-14.65-1.166-29.434-1.52-41.334l-.097-3.283 3.18.824c6.238 1.617 " +
  "10.55 7.376 12.76 14.507 2.02 6.51 2.353 14.37.64 22.248a29.764 29.764 0 0 0 12.847 1.181l4.399-.588" +
  "c1.033-18.811-1.433-37.403-6.27-46.264l-4.408-6.376c-4.647-5.357-10.62-8.399-17.665-11.074" +
  "-6.746-3.458-18.358-6.614-28.95-6.614zm0 3.05c6.494 0 13.37 1.942 19.274 4.516-3.123 2.758-6.971 " +
  "4.665-11.067 5.754l-7.852 17.31-6.838-16.882c-4.757-.93-9.26-2.957-12.783-6.174C50.9 13.081 57.809 " +
  "11.2 63.993 11.2zm.58 28.539l3.512 5.327-3.497 5.053-3.53-5.053zm0 11.888l3.512 5.328-3.497 " +
  "5.052-3.53-5.053 3.514-5.327zm0 11.733l3.512 5.327-3.497 5.054-3.53-5.054zm0 11.876l3.512 " +
  "5.327-3.497 5.054-3.53-5.053 3.514-5.327zm25.079 13.715c-6.61 2.055-15.829 2.907-25.277 " +
  "2.951-9.5.045-18.965-.744-25.902-2.892-.205 1.785-.43 3.569-.678 5.347 5.968 2.132 16.346 3.408 " +
  "26.497 3.36 10.143-.05 20.355-1.444 25.912-3.433a241.302 241.302 0 0 1-.552-5.333zm1.368 " +
  "9.086c-6.782 2.308-16.533 3.262-26.53 3.31-2.935.015-5.866-.052-8.724-.213l-4.227-.315c-5.358-.5" +
  "-10.307-1.382-14.329-2.758-.897 5.43-2.02 10.772-3.413 15.903 2.117 1.06 4.41 1.968 6.835 " +
  "2.733l3.97 1.096c15.85 3.805 35.88 2.156 49.601-3.513-1.355-5.09-2.387-10.57-3.183-16.243z";

export const LOOT_ICON_SIZE = 128;
export const LOOT_INNER_SIZE = 148;
export const LOOT_OUTER_SIZE = 146;

/** Loot icon: flat tint fill, no stroke, so it lines up with the stock asset. */
export function svgLootShirt(tint: string): string {
  return svgDocument(LOOT_ICON_SIZE, LOOT_ICON_SIZE, [`<path d="${LOOT_SHIRT_PATH}" fill="${tint}"/>`]);
}

/** Inner glow: radial highlight fading out from a lightened tint. */
export function svgLootCircleInner(base: string): string {
  const highlight = lighten(base, 0.25);
  const fade = darken(base, 0.65);
  return svgDocument(LOOT_INNER_SIZE, LOOT_INNER_SIZE, [
    `<defs>` +
      `<radialGradient id="lootInner" cx="50%" cy="50%" r="50%">` +
      `<stop offset="0%" stop-color="${highlight}" stop-opacity="1"/>` +
      `<stop offset="100%" stop-color="${fade}" stop-opacity="0"/>` +
      `</radialGradient>` +
      `</defs>`,
    `<ellipse cx="74" cy="74" rx="68.861" ry="68.769" fill="url(#lootInner)" />`,
  ]);
}

/** Outer ring: translucent lightened fill with a stroke in the tint itself. */
export function svgLootCircleOuter(stroke: string): string {
  const fill = lighten(stroke, 0.6);
  return svgDocument(LOOT_OUTER_SIZE, LOOT_OUTER_SIZE, [
    `<ellipse cx="73" cy="73" rx="68.861" ry="68.769" fill="${fill}" fill-opacity="0.27" ` +
      `stroke="${stroke}" stroke-width="6.21" stroke-opacity="0.77" />`,
  ]);
}
