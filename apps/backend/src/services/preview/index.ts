export { DEFAULT_LAYOUT, makeLayout } from "./layout";
export type { PreviewLayout } from "./layout";
export { DEFAULT_PRESET, PREVIEW_PRESETS, presetLayout } from "./presets";
export type { PreviewPreset } from "./presets";
export { bodyFrameFromLayout, resolvePreviewGeometry } from "./geometry";
export type {
  BodyFrame,
  FrontPlacement,
  LayerOptions,
  PreviewElement,
  PreviewElementId,
  PreviewSprite,
  ResolvedPreview,
} from "./geometry";
export { buildPreviewDocument, buildPreviewHtml } from "./html";
export type { PreviewUris } from "./html";
