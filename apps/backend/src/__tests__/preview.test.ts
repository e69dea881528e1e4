import { describe, it, expect } from "vitest";
import {
  bodyFrameFromLayout,
  buildPreviewDocument,
  buildPreviewHtml,
  DEFAULT_LAYOUT,
  makeLayout,
  presetLayout,
  PREVIEW_PRESETS,
  resolvePreviewGeometry,
  type FrontPlacement,
  type PreviewElement,
  type PreviewElementId,
  type ResolvedPreview,
} from "../services/preview";

const front = (overrides: Partial<FrontPlacement> = {}): FrontPlacement => ({
  enabled: true,
  posX: 0,
  posY: 0,
  size: null,
  rotation: 0,
  aboveHand: false,
  ...overrides,
});

function byId(resolved: ResolvedPreview, id: PreviewElementId): PreviewElement {
  const el = resolved.elements.find((e) => e.id === id);
  if (!el) throw new Error(`missing element ${id}`);
  return el;
}

const zOf = (resolved: ResolvedPreview, id: PreviewElementId): number => byId(resolved, id).z;

describe("layouts", () => {
  it("freezes layouts built from overrides", () => {
    const layout = makeLayout({ handSize: 40 });
    expect(Object.isFrozen(layout)).toBe(true);
    expect(layout.handSize).toBe(40);
    expect(layout.bodySize).toBe(DEFAULT_LAYOUT.bodySize);
  });

  it("centers the body on the stage unless a left override is given", () => {
    expect(bodyFrameFromLayout(DEFAULT_LAYOUT)).toEqual({ left: 143, top: 190, width: 134, height: 134, rotation: 0 });
    expect(bodyFrameFromLayout(makeLayout({ bodyLeftOffset: 7 })).left).toBe(150);
    expect(bodyFrameFromLayout(makeLayout({ bodyLeft: 12, bodyWidth: 100 })).left).toBe(12);
  });

  it("describes every preset", () => {
    expect(Object.keys(PREVIEW_PRESETS)).toEqual(["Loadout", "Standing", "Knocked"]);
    for (const preset of Object.values(PREVIEW_PRESETS)) {
      expect(preset.description.length).toBeGreaterThan(0);
    }
  });
});

describe("resolvePreviewGeometry", () => {
  it("places limbs relative to the body and mirrors the right side", () => {
    const resolved = resolvePreviewGeometry(DEFAULT_LAYOUT);
    expect(byId(resolved, "hand-left")).toMatchObject({ left: 111, top: 290, width: 52, height: 52, transform: "rotate(0deg)" });
    expect(byId(resolved, "hand-right")).toMatchObject({ left: 257, top: 290, transform: "scaleX(-1) rotate(0deg)" });
    expect(byId(resolved, "backpack")).toMatchObject({ left: 136, top: 110, z: 10 });
    expect(byId(resolved, "overlay")).toMatchObject({ left: 130, top: 177, width: 160, z: 40 });
  });

  it("emits elements back to front", () => {
    const resolved = resolvePreviewGeometry(DEFAULT_LAYOUT);
    expect(resolved.elements.map((e) => e.id)).toEqual(["backpack", "body", "overlay", "hand-left", "hand-right"]);
  });

  it("keeps the body frame when unrelated fields change", () => {
    const before = resolvePreviewGeometry(DEFAULT_LAYOUT).body;
    const after = resolvePreviewGeometry(makeLayout({ handOffsetX: 80, feetSize: 60, overlaySize: 200 })).body;
    expect(after).toEqual(before);
  });

  it("changes only z when a part moves below the body", () => {
    const above = byId(resolvePreviewGeometry(DEFAULT_LAYOUT), "hand-left");
    const below = byId(resolvePreviewGeometry(makeLayout({ handsAboveBody: false })), "hand-left");
    expect(below).toEqual({ ...above, z: 25 });
  });

  it("tucks limbs under the body in the knocked pose", () => {
    const layout = presetLayout("Knocked");
    expect(layout.showBackpack).toBe(false);
    expect(layout.showOverlay).toBe(false);
    expect(layout.showFeet).toBe(true);
    expect(layout.handsAboveBody).toBe(false);
    expect(layout.feetAboveBody).toBe(false);

    const resolved = resolvePreviewGeometry(layout);
    expect(resolved.elements.map((e) => e.id)).toEqual(["feet-left", "feet-right", "hand-left", "hand-right", "body"]);
    expect(byId(resolved, "body")).toMatchObject({ left: 95, top: 118, transform: "rotate(-28deg)" });
    expect(byId(resolved, "hand-left")).toMatchObject({ left: 61, top: 222, transform: "rotate(-18deg)" });
    expect(byId(resolved, "feet-left")).toMatchObject({ left: 59, top: 244, width: 44 });
    expect(byId(resolved, "feet-right")).toMatchObject({ left: 217, transform: "scaleX(-1) rotate(22deg)" });
  });

  it("hides the overlay when it is switched off", () => {
    const resolved = resolvePreviewGeometry(DEFAULT_LAYOUT, null, { overlayEnabled: false, overlayAboveFront: true });
    expect(resolved.elements.some((e) => e.id === "overlay")).toBe(false);
  });
});

describe("front accessory", () => {
  it("defaults to the body frame, offset by its position", () => {
    const el = byId(resolvePreviewGeometry(DEFAULT_LAYOUT, front({ posX: 10, posY: -5, rotation: 15 })), "front");
    expect(el).toMatchObject({ left: 153, top: 185, width: 134, height: 134, transform: "rotate(15deg)" });
  });

  it("centers explicit sizes on the body", () => {
    const el = byId(resolvePreviewGeometry(DEFAULT_LAYOUT, front({ size: 60 })), "front");
    expect(el).toMatchObject({ left: 180, top: 227, width: 60 });
  });

  it("is omitted when disabled", () => {
    const resolved = resolvePreviewGeometry(DEFAULT_LAYOUT, front({ enabled: false }));
    expect(resolved.elements.some((e) => e.id === "front")).toBe(false);
  });

  it("sits one step above or below the hands", () => {
    const options = { overlayEnabled: false, overlayAboveFront: true };
    expect(zOf(resolvePreviewGeometry(DEFAULT_LAYOUT, front({ aboveHand: true }), options), "front")).toBe(51);
    expect(zOf(resolvePreviewGeometry(DEFAULT_LAYOUT, front({ aboveHand: false }), options), "front")).toBe(49);
  });

  it("lifts the overlay above an accessory it should cover", () => {
    const resolved = resolvePreviewGeometry(DEFAULT_LAYOUT, front({ aboveHand: false }), {
      overlayEnabled: true,
      overlayAboveFront: true,
    });
    expect(zOf(resolved, "front")).toBe(49);
    expect(zOf(resolved, "overlay")).toBe(49.5);
    expect(resolved.elements.map((e) => e.id).slice(-4)).toEqual(["front", "overlay", "hand-left", "hand-right"]);
  });

  it("lifts the accessory above the overlay when asked to", () => {
    const layout = makeLayout({ handsAboveBody: false });
    const resolved = resolvePreviewGeometry(layout, front({ aboveHand: false }), {
      overlayEnabled: true,
      overlayAboveFront: false,
    });
    expect(zOf(resolved, "overlay")).toBe(40);
    expect(zOf(resolved, "front")).toBe(40.5);
  });

  it("leaves both layers alone when the order already holds", () => {
    const resolved = resolvePreviewGeometry(DEFAULT_LAYOUT, front({ aboveHand: true }), {
      overlayEnabled: true,
      overlayAboveFront: false,
    });
    expect(zOf(resolved, "overlay")).toBe(40);
    expect(zOf(resolved, "front")).toBe(51);
  });
});

describe("preview html", () => {
  const uris = {
    backpack: "data:backpack",
    body: "data:body",
    overlay: "data:overlay",
    hands: "data:hands",
    feet: "data:feet",
    front: "data:front",
    loot: "data:loot",
    lootInner: "data:inner",
    lootOuter: "data:outer",
  };

  it("writes one positioned rule and image per element", () => {
    const html = buildPreviewHtml(uris, resolvePreviewGeometry(DEFAULT_LAYOUT));
    expect(html).toContain(
      [
        "  .preview-hand-right {",
        "    left: 257px;",
        "    top: 290px;",
        "    width: 52px;",
        "    height: 52px;",
        "    transform: scaleX(-1) rotate(0deg);",
        "    transform-origin: center;",
        "    z-index: 100;",
        "  }",
      ].join("\n"),
    );
    expect(html).toContain('    <img class="preview-hand-right" src="data:hands" alt="Right hand" />');
    expect(html).not.toContain("preview-front");
  });

  it("keeps half-step layers integral in CSS", () => {
    const html = buildPreviewHtml(uris, resolvePreviewGeometry(DEFAULT_LAYOUT, front()));
    expect(html).toContain("    z-index: 99;");
    expect(html).toContain("    z-index: 98;");
  });

  it("drops the accessory when it has no image", () => {
    const html = buildPreviewHtml({ ...uris, front: null }, resolvePreviewGeometry(DEFAULT_LAYOUT, front()));
    expect(html).not.toContain("preview-front");
  });

  it("wraps fragments in an escaped standalone page", () => {
    const page = buildPreviewDocument("A <b> & c", "<p>x</p>");
    expect(page.startsWith("<!doctype html>")).toBe(true);
    expect(page).toContain("<title>A &lt;b> &amp; c</title>");
    expect(page).toContain("<p>x</p>");
  });
});
