import { svgDocument } from "../svg";

export const OVERLAY_SIZE = 160;

/** Armor ring and helmet accent. Preview only; never exported. */
export function svgBodyPreviewOverlay(): string {
  const center = OVERLAY_SIZE / 2;
  return svgDocument(OVERLAY_SIZE, OVERLAY_SIZE, [
    `<circle cx="${center}" cy="${center}" r="70" fill="none" stroke="#20160a" stroke-width="12" />`,
    `<circle cx="${center}" cy="${center - 22}" r="40" fill="#3c7fda" stroke="#174173" stroke-width="8" />`,
  ]);
}
