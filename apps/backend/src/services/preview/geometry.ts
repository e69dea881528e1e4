import type { PreviewLayout } from "./layout";

/* ---------- Public types ---------- */

export type BodyFrame = Readonly<{
  left: number;
  top: number;
  width: number;
  height: number;
  rotation: number;
}>;

/** Which rendered sprite an element shows. */
export type PreviewSprite = "backpack" | "body" | "overlay" | "hands" | "feet" | "front";

export type PreviewElementId =
  | "backpack"
  | "body"
  | "overlay"
  | "hand-left"
  | "hand-right"
  | "feet-left"
  | "feet-right"
  | "front";

export type PreviewElement = {
  id: PreviewElementId;
  sprite: PreviewSprite;
  label: string;
  left: number;
  top: number;
  width: number;
  height: number;
  /** CSS transform; always non-empty. */
  transform: string;
  z: number;
};

/** Placement of the optional front accessory relative to the body frame. */
export type FrontPlacement = {
  enabled: boolean;
  posX: number;
  posY: number;
  /** `null` follows the body width. */
  size: number | null;
  rotation: number;
  aboveHand: boolean;
};

export type LayerOptions = {
  /** Overlay visibility toggle on top of the layout's own `showOverlay`. */
  overlayEnabled: boolean;
  /** The overlay stays above the front accessory (only matters when both render). */
  overlayAboveFront: boolean;
};

export type ResolvedPreview = {
  stageWidth: number;
  stageHeight: number;
  body: BodyFrame;
  /** Visible elements, back to front. */
  elements: PreviewElement[];
};

/* ---------- Layer constants ---------- */

const Z_BACKPACK = 10;
const Z_BODY = 30;
const Z_OVERLAY = { above: 40, below: 20 } as const;
const Z_FEET = { above: 45, below: 15 } as const;
const Z_HANDS = { above: 50, below: 25 } as const;

/** Half-step used to slot one layer between two fixed ones. */
const Z_NUDGE = 0.5;

const DEFAULT_LAYER_OPTIONS: LayerOptions = { overlayEnabled: true, overlayAboveFront: true };

/* ---------- Core functions ---------- */

export function bodyFrameFromLayout(layout: PreviewLayout): BodyFrame {
  const width = layout.bodyWidth ?? layout.bodySize;
  const height = layout.bodyHeight ?? layout.bodySize;
  const left = layout.bodyLeft ?? Math.floor((layout.stageWidth - width) / 2) + layout.bodyLeftOffset;
  return {
    left,
    top: layout.bodyTop,
    width,
    height,
    rotation: layout.bodyRotation,
  };
}

function transform(parts: Array<string | null>): string {
  const filtered = parts.filter((p): p is string => Boolean(p));
  return filtered.length > 0 ? filtered.join(" ") : "rotate(0deg)";
}

const rotate = (deg: number): string => `rotate(${deg}deg)`;

type LimbGeometry = {
  width: number;
  height: number;
  left: number;
  top: number;
};

/** Left limb placement; the right one mirrors it across the stage center. */
function limbGeometry(
  body: BodyFrame,
  limb: { size: number; offsetX: number; offsetY: number; top: number | null; width: number | null; height: number | null; left: number | null },
): LimbGeometry {
  const width = limb.width ?? limb.size;
  const height = limb.height ?? limb.size;
  const left = limb.left ?? body.left - limb.offsetX;
  const top = limb.top ?? body.top + body.height - limb.offsetY;
  return { width, height, left, top };
}

function mirroredLeft(layout: PreviewLayout, limb: LimbGeometry): number {
  return layout.stageWidth - limb.left - limb.width;
}

/**
 * Resolve every sprite's box, transform and z-index for one layout. Pure: the
 * same inputs always give the same output, and the above/below flags only ever
 * change `z`.
 */
export function resolvePreviewGeometry(
  layout: PreviewLayout,
  front: FrontPlacement | null = null,
  options: LayerOptions = DEFAULT_LAYER_OPTIONS,
): ResolvedPreview {
  const body = bodyFrameFromLayout(layout);
  const elements: PreviewElement[] = [];

  if (layout.showBackpack) {
    elements.push({
      id: "backpack",
      sprite: "backpack",
      label: "Backpack",
      left: Math.floor((layout.stageWidth - layout.backpackSize) / 2) + layout.backpackOffsetX,
      top: layout.backpackTop,
      width: layout.backpackSize,
      height: layout.backpackSize,
      transform: transform([]),
      z: Z_BACKPACK,
    });
  }

  elements.push({
    id: "body",
    sprite: "body",
    label: "Body",
    left: body.left,
    top: body.top,
    width: body.width,
    height: body.height,
    transform: transform([rotate(body.rotation)]),
    z: Z_BODY,
  });

  const showOverlay = layout.showOverlay && options.overlayEnabled;
  let overlayZ = layout.overlayAboveBody ? Z_OVERLAY.above : Z_OVERLAY.below;

  const feet = limbGeometry(body, {
    size: layout.feetSize,
    offsetX: layout.feetOffsetX,
    offsetY: layout.feetOffsetY,
    top: layout.feetTop,
    width: layout.feetWidth,
    height: layout.feetHeight,
    left: layout.feetLeft,
  });
  const feetZ = layout.feetAboveBody ? Z_FEET.above : Z_FEET.below;
  if (layout.showFeet) {
    elements.push(
      {
        id: "feet-left",
        sprite: "feet",
        label: "Left foot",
        ...feet,
        transform: transform([rotate(layout.feetRotationLeft)]),
        z: feetZ,
      },
      {
        id: "feet-right",
        sprite: "feet",
        label: "Right foot",
        ...feet,
        left: mirroredLeft(layout, feet),
        transform: transform([layout.rightFootMirror ? "scaleX(-1)" : null, rotate(layout.feetRotationRight)]),
        z: feetZ,
      },
    );
  }

  const hands = limbGeometry(body, {
    size: layout.handSize,
    offsetX: layout.handOffsetX,
    offsetY: layout.handOffsetY,
    top: layout.handTop,
    width: layout.handWidth,
    height: layout.handHeight,
    left: layout.handLeft,
  });
  const handsZ = layout.handsAboveBody ? Z_HANDS.above : Z_HANDS.below;
  elements.push(
    {
      id: "hand-left",
      sprite: "hands",
      label: "Left hand",
      ...hands,
      transform: transform([rotate(layout.handRotationLeft)]),
      z: handsZ,
    },
    {
      id: "hand-right",
      sprite: "hands",
      label: "Right hand",
      ...hands,
      left: mirroredLeft(layout, hands),
      transform: transform([layout.rightHandMirror ? "scaleX(-1)" : null, rotate(layout.handRotationRight)]),
      z: handsZ,
    },
  );

  if (front?.enabled) {
    const size = front.size ?? body.width;
    let frontZ = front.aboveHand ? handsZ + 1 : handsZ - 1;

    // The overlay/front relation is resolved last so both "above" flags hold.
    if (showOverlay) {
      if (options.overlayAboveFront && overlayZ <= frontZ) {
        overlayZ = frontZ + Z_NUDGE;
      } else if (!options.overlayAboveFront && frontZ <= overlayZ) {
        frontZ = overlayZ + Z_NUDGE;
      }
    }

    elements.push({
      id: "front",
      sprite: "front",
      label: "Front accessory",
      left: body.left + Math.floor((body.width - size) / 2) + front.posX,
      top: body.top + Math.floor((body.height - size) / 2) + front.posY,
      width: size,
      height: size,
      transform: transform([rotate(front.rotation)]),
      z: frontZ,
    });
  }

  if (showOverlay) {
    elements.push({
      id: "overlay",
      sprite: "overlay",
      label: "Body overlay",
      left: body.left - Math.floor((layout.overlaySize - body.width) / 2) + layout.overlayOffsetX,
      top: body.top - Math.floor((layout.overlaySize - body.height) / 2) + layout.overlayOffsetY,
      width: layout.overlaySize,
      height: layout.overlaySize,
      transform: transform([]),
      z: overlayZ,
    });
  }

  // Array.prototype.sort is stable: equal z keeps declaration order.
  elements.sort((a, b) => a.z - b.z);

  return {
    stageWidth: layout.stageWidth,
    stageHeight: layout.stageHeight,
    body,
    elements,
  };
}
