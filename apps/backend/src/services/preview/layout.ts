/**
 * Pose geometry for the composed preview. All sizes are stage pixels. Optional
 * overrides are `null` when unset and resolve to values derived from the stage
 * and the body (see geometry.ts).
 */
export type PreviewLayout = Readonly<{
  stageWidth: number;
  stageHeight: number;

  bodySize: number;
  bodyTop: number;
  bodyLeftOffset: number;
  bodyRotation: number;
  bodyWidth: number | null;
  bodyHeight: number | null;
  bodyLeft: number | null;

  handSize: number;
  handOffsetX: number;
  handOffsetY: number;
  handTop: number | null;
  handWidth: number | null;
  handHeight: number | null;
  handLeft: number | null;
  handRotationLeft: number;
  handRotationRight: number;
  rightHandMirror: boolean;
  handsAboveBody: boolean;

  backpackSize: number;
  backpackTop: number;
  backpackOffsetX: number;
  showBackpack: boolean;

  overlaySize: number;
  overlayOffsetX: number;
  overlayOffsetY: number;
  overlayAboveBody: boolean;
  showOverlay: boolean;

  showFeet: boolean;
  feetSize: number;
  feetOffsetX: number;
  feetOffsetY: number;
  feetTop: number | null;
  feetWidth: number | null;
  feetHeight: number | null;
  feetLeft: number | null;
  feetRotationLeft: number;
  feetRotationRight: number;
  rightFootMirror: boolean;
  feetAboveBody: boolean;
}>;

export const DEFAULT_LAYOUT: PreviewLayout = Object.freeze({
  stageWidth: 420,
  stageHeight: 480,

  bodySize: 134,
  bodyTop: 190,
  bodyLeftOffset: 0,
  bodyRotation: 0,
  bodyWidth: null,
  bodyHeight: null,
  bodyLeft: null,

  handSize: 52,
  handOffsetX: 32,
  handOffsetY: 34,
  handTop: null,
  handWidth: null,
  handHeight: null,
  handLeft: null,
  handRotationLeft: 0,
  handRotationRight: 0,
  rightHandMirror: true,
  handsAboveBody: true,

  backpackSize: 148,
  backpackTop: 110,
  backpackOffsetX: 0,
  showBackpack: true,

  overlaySize: 160,
  overlayOffsetX: 0,
  overlayOffsetY: 0,
  overlayAboveBody: true,
  showOverlay: true,

  showFeet: false,
  feetSize: 38,
  feetOffsetX: 28,
  feetOffsetY: 12,
  feetTop: null,
  feetWidth: null,
  feetHeight: null,
  feetLeft: null,
  feetRotationLeft: 0,
  feetRotationRight: 0,
  rightFootMirror: true,
  feetAboveBody: true,
});

/** Defaults merged with `overrides`, frozen. */
export function makeLayout(overrides: Partial<PreviewLayout> = {}): PreviewLayout {
  return Object.freeze({ ...DEFAULT_LAYOUT, ...overrides });
}
