import { describe, it, expect } from "vitest";
import { buildFill, type FillParams } from "../services/fills";

const base: FillParams = {
  style: "solid",
  primary: "#112233",
  secondary: "#445566",
  extra: "#778899",
  angle: 30,
  gap: 24,
  opacity: 0.5,
  size: 6,
};

describe("buildFill", () => {
  it("returns the primary color with no defs for solid fills", () => {
    expect(buildFill(base)).toEqual({ defs: "", ref: "#112233" });
  });

  it("scopes definition ids with the prefix", () => {
    const fill = buildFill({ ...base, style: "diagonal_stripes" }, "body");
    expect(fill.ref).toBe("url(#body-ds)");
    expect(fill.defs).toContain('<pattern id="body-ds"');
    expect(fill.defs).toContain('width="48" height="48"');
    expect(fill.defs).toContain('patternTransform="rotate(30)"');
    expect(fill.defs).toContain('fill="#778899" opacity="0.5"');
  });

  it("fixes the stripe angle for horizontal and vertical stripes", () => {
    expect(buildFill({ ...base, style: "horizontal_stripes" }).defs).toContain('patternTransform="rotate(0)"');
    expect(buildFill({ ...base, style: "vertical_stripes" }).defs).toContain('patternTransform="rotate(90)"');
  });

  it("uses primary and secondary for gradients", () => {
    const linear = buildFill({ ...base, style: "linear_gradient" }, "hands");
    expect(linear.ref).toBe("url(#hands-lg)");
    expect(linear.defs).toContain('gradientTransform="rotate(30 256 256)"');
    expect(linear.defs).toContain('<stop offset="0%" stop-color="#112233"/>');
    expect(linear.defs).toContain('<stop offset="100%" stop-color="#445566"/>');

    const radial = buildFill({ ...base, style: "radial_gradient" }, "hands");
    expect(radial.ref).toBe("url(#hands-rg)");
    expect(radial.defs).toContain('cx="50%" cy="45%" r="60%"');
  });

  it("sizes dot, crosshatch and checker tiles from gap and size", () => {
    expect(buildFill({ ...base, style: "dots", gap: 22 }).defs).toContain(
      '<circle cx="11" cy="11" r="6" fill="#778899" opacity="0.5"/>',
    );
    expect(buildFill({ ...base, style: "crosshatch", gap: 20 }).defs).toContain('stroke-width="10"');
    const checker = buildFill({ ...base, style: "checker", size: 16 });
    expect(checker.defs).toContain('width="32" height="32"');
    expect(checker.defs).toContain('<rect x="16" y="0" width="16" height="16" fill="#445566"/>');
  });

  it("gives two parts distinct ids for the same style", () => {
    const a = buildFill({ ...base, style: "checker" }, "feet");
    const b = buildFill({ ...base, style: "checker" }, "backpack");
    expect(a.ref).not.toBe(b.ref);
  });
});
