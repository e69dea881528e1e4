import { describe, it, expect } from "vitest";
import { defaultSkinDraft, type HandsConfig, type OutlineSpec } from "@outfit-forge/shared-schema";
import { UnsupportedAssetError } from "../services/errors";
import {
  assertSupportedAsset,
  backpackSprite,
  bodySprite,
  buildPartSvg,
  feetSprite,
  handShape,
  handsSprite,
  outlineStyleParts,
  svgFromUpload,
  svgLootCircleOuter,
  svgLootShirt,
} from "../services/sprites";
import { svgHeader } from "../services/svg";

const outline = (overrides: Partial<OutlineSpec> = {}): OutlineSpec => ({
  color: "#333333",
  width: 8,
  style: "solid",
  glow_color: null,
  glow_size: null,
  ...overrides,
});

const PNG_BYTES = Uint8Array.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x01]);

describe("part sprites", () => {
  it("draws the body as a single unstroked ellipse", () => {
    expect(buildPartSvg(defaultSkinDraft.parts.body, bodySprite)).toBe(
      [svgHeader(140, 140), '<ellipse cx="70" cy="70" rx="66" ry="66" fill="#f8c574" />', "</svg>"].join("\n"),
    );
  });

  it("falls back to the part's stock stroke width without an outline", () => {
    const svg = buildPartSvg(defaultSkinDraft.parts.hands, handsSprite);
    expect(svg).toContain(
      '<ellipse cx="38" cy="38" rx="30.40" ry="30.40" fill="#f8c574" stroke="#333333" stroke-width="11.096" />',
    );
  });

  it("uses the given outline instead of the stock stroke", () => {
    const svg = buildPartSvg(defaultSkinDraft.parts.feet, feetSprite, outline({ color: "#102030", width: 5 }));
    expect(svg).toContain('<ellipse cx="19" cy="19" rx="15.7" ry="9.8" fill="#f8c574" stroke="#102030" stroke-width="5" />');
  });

  it("scopes fill ids to the part", () => {
    const cfg = { ...defaultSkinDraft.parts.backpack, style: "checker" as const };
    const svg = buildPartSvg(cfg, backpackSprite);
    expect(svg).toContain('<pattern id="backpack-ck"');
    expect(svg).toContain('fill="url(#backpack-ck)"');
  });
});

describe("hand shapes", () => {
  const hands = (overrides: Partial<HandsConfig>): HandsConfig => ({ ...defaultSkinDraft.parts.hands, ...overrides });

  it("places diamond corners around the canvas center", () => {
    expect(handShape(hands({ shape: "diamond" }))('fill="red"')).toBe(
      '<polygon points="38.00,6.00 66.00,38.00 38.00,70.00 10.00,38.00" fill="red" />',
    );
  });

  it("scales the circle per axis", () => {
    expect(handShape(hands({ shape_scale_x: 1.5, shape_scale_y: 0.5 }))("")).toBe(
      '<ellipse cx="38" cy="38" rx="45.60" ry="15.20"  />',
    );
  });

  it("draws rounded squares and teardrops", () => {
    expect(handShape(hands({ shape: "rounded_square" }))("x")).toBe(
      '<rect x="14.00" y="14.00" width="48.00" height="48.00" rx="12.00" ry="12.00" x />',
    );
    expect(handShape(hands({ shape: "teardrop" }))("x")).toBe(
      '<path d="M 8.00 38.00 A 30.00 30.00 0 1 1 68.00 38.00 L 38.00 64.00 Z" x />',
    );
  });
});

describe("outline styles", () => {
  it("keeps solid strokes plain", () => {
    expect(outlineStyleParts(outline(), "hands")).toEqual({
      defs: "",
      attrs: 'stroke="#333333" stroke-width="8"',
      outer: null,
    });
  });

  it("adds a part-scoped glow filter", () => {
    const parts = outlineStyleParts(outline({ style: "glow", glow_color: "#ff0000", glow_size: 10 }), "backpack");
    expect(parts.defs).toContain('<filter id="backpack-glow"');
    expect(parts.defs).toContain('stdDeviation="5.00"');
    expect(parts.defs).toContain('<feFlood flood-color="#ff0000" result="tint"/>');
    expect(parts.attrs).toBe('stroke="#333333" stroke-width="8" filter="url(#backpack-glow)"');
  });

  it("derives the glow from the stroke when no glow settings are given", () => {
    const parts = outlineStyleParts(outline({ style: "glow" }), "feet");
    expect(parts.defs).toContain('stdDeviation="4.00"');
    expect(parts.defs).toContain('<feFlood flood-color="#333333" result="tint"/>');
  });

  it("shades gradient strokes from the outline color", () => {
    const parts = outlineStyleParts(outline({ style: "gradient" }), "hands");
    expect(parts.defs).toContain('<stop offset="0%" stop-color="#5c5c5c"/>');
    expect(parts.defs).toContain('<stop offset="100%" stop-color="#292929"/>');
    expect(parts.attrs).toBe('stroke="url(#hands-stroke-grad)" stroke-width="8"');
  });

  it("dashes proportionally to the width", () => {
    expect(outlineStyleParts(outline({ style: "dashed", width: 10 }), "feet").attrs).toBe(
      'stroke="#333333" stroke-width="10" stroke-dasharray="16.00 9.00"',
    );
  });

  it("draws a darker, wider ring behind double strokes", () => {
    const svg = buildPartSvg(defaultSkinDraft.parts.feet, feetSprite, outline({ style: "double_stroke" }));
    const lines = svg.split("\n");
    expect(lines[1]).toBe('<ellipse cx="19" cy="19" rx="15.7" ry="9.8" fill="none" stroke="#262626" stroke-width="12.8" />');
    expect(lines[2]).toBe(
      '<ellipse cx="19" cy="19" rx="15.7" ry="9.8" fill="#f8c574" stroke="#333333" stroke-width="8" />',
    );
  });
});

describe("loot sprites", () => {
  it("fills the shirt with the loot tint and no stroke", () => {
    const svg = svgLootShirt("#ffffff");
    expect(svg.startsWith(svgHeader(128, 128))).toBe(true);
    expect(svg).toContain('fill="#ffffff"/>');
    expect(svg).not.toContain("stroke=");
  });

  it("lightens the border fill from its stroke", () => {
    expect(svgLootCircleOuter("#000000")).toContain(
      '<ellipse cx="73" cy="73" rx="68.861" ry="68.769" fill="#999999" fill-opacity="0.27" ' +
        'stroke="#000000" stroke-width="6.21" stroke-opacity="0.77" />',
    );
  });
});

describe("uploads", () => {
  const pngBase64 = Buffer.from(PNG_BYTES).toString("base64");

  it("wraps accepted bytes in a canvas-sized image", () => {
    expect(svgFromUpload(PNG_BYTES, "image/png", 76, 76)).toBe(
      [
        svgHeader(76, 76),
        `<image href="data:image/png;base64,${pngBase64}" x="0" y="0" width="76" height="76" preserveAspectRatio="xMidYMid meet" />`,
        "</svg>",
      ].join("\n"),
    );
  });

  it("rotates and scales about the canvas center", () => {
    expect(svgFromUpload(PNG_BYTES, "image/png", 76, 76, 90, 1.5)).toContain(
      ' transform="translate(38.00,38.00) rotate(90.00) scale(1.5000) translate(-38.00,-38.00)" />',
    );
  });

  it("rejects unknown mime types, empty files and mismatched signatures", () => {
    expect(() => assertSupportedAsset(PNG_BYTES, "image/bmp")).toThrow(UnsupportedAssetError);
    expect(() => assertSupportedAsset(new Uint8Array(0), "image/png")).toThrow("file is empty");
    expect(() => assertSupportedAsset(PNG_BYTES, "image/jpeg")).toThrow(
      "unsupported asset (image/jpeg): content does not match the declared format",
    );
  });

  it("accepts svg text and webp containers", () => {
    const svgBytes = Buffer.from('<?xml version="1.0"?><SVG xmlns="http://www.w3.org/2000/svg"></SVG>');
    expect(() => assertSupportedAsset(svgBytes, "image/svg+xml")).not.toThrow();
    const webp = Buffer.from("RIFF\u0000\u0000\u0000\u0000WEBPVP8 ", "latin1");
    expect(() => assertSupportedAsset(webp, "image/webp")).not.toThrow();
  });

  it("replaces generated art when a part carries an upload", () => {
    const cfg = {
      ...defaultSkinDraft.parts.body,
      upload: { data: pngBase64, mime: "image/png", rotation: 0, scale: 1 },
    };
    const svg = buildPartSvg(cfg, bodySprite);
    expect(svg).toContain(`<image href="data:image/png;base64,${pngBase64}" x="0" y="0" width="140" height="140"`);
    expect(svg).not.toContain("<ellipse");
  });
});
