import { describe, it, expect } from "vitest";
import { defaultSkinDraft, type ExportOpts, type SkinDraft, type TintMap } from "@outfit-forge/shared-schema";
import {
  adjustTintsForSpriteMode,
  applyPrefix,
  buildConfigBlock,
  buildFilenames,
  buildManifest,
  buildTints,
  ensureExtension,
  filenameForArchive,
  sanitize,
  skinIdentifiers,
  type FilenameArgs,
  type SkinManifest,
} from "../services/export";

const DIRS = { player: "img/player/", loot: "img/loot/" };

const filenameArgs = (overrides: Partial<FilenameArgs> = {}): FilenameArgs => ({
  baseId: "basicoutfit",
  spriteMode: "custom",
  existingSpriteIds: {},
  dirs: DIRS,
  refExt: ".img",
  lootBorderOn: true,
  lootBorderName: "loot-circle-outer-01",
  lootInnerName: "loot-circle-inner-01",
  frontEnabled: false,
  ...overrides,
});

const opts = (overrides: Partial<ExportOpts> = {}): ExportOpts => ({ ...defaultSkinDraft.meta, ...overrides });

const UI_TINTS: TintMap = {
  base: "0xf8c574",
  hand: "0xf8c574",
  foot: "0xf8c574",
  backpack: "0x816537",
  loot: "0xffffff",
  border: "0x000000",
};

describe("naming", () => {
  it("sanitizes skin names to alphanumerics", () => {
    expect(sanitize("  Basic Outfit! ")).toBe("BasicOutfit");
    expect(sanitize("Rock-n-Roll 2")).toBe("RocknRoll2");
    expect(sanitize("")).toBe("Custom");
    expect(sanitize(" !!! ")).toBe("Custom");
  });

  it("derives the identifier and the lowercase file id", () => {
    expect(skinIdentifiers("Basic Outfit")).toEqual({ ident: "outfitBasicOutfit", baseId: "basicoutfit" });
    expect(skinIdentifiers("")).toEqual({ ident: "outfitCustom", baseId: "custom" });
  });

  it("forces extensions with or without the dot", () => {
    expect(ensureExtension("loot-circle-outer-01", ".img")).toBe("loot-circle-outer-01.img");
    expect(ensureExtension("border.png", "svg")).toBe("border.svg");
    expect(ensureExtension(" border.svg ", ".svg")).toBe("border.svg");
    expect(ensureExtension("   ", ".img")).toBe("");
  });

  it("looks for the extension only in the last path segment", () => {
    expect(ensureExtension("skins.v2/player-base-01", ".img")).toBe("skins.v2/player-base-01.img");
    expect(ensureExtension("skins.v2/border.png", "svg")).toBe("skins.v2/border.svg");
  });

  it("prefixes directories only for bare filenames", () => {
    expect(applyPrefix("img/player", "a.svg")).toBe("img/player/a.svg");
    expect(applyPrefix("img/player/", "a.svg")).toBe("img/player/a.svg");
    expect(applyPrefix("img/player/", "other/a.svg")).toBe("other/a.svg");
    expect(applyPrefix("  ", "a.svg")).toBe("a.svg");
  });

  it("always archives vector files", () => {
    expect(filenameForArchive("img/player/player-base-x.img")).toBe("img/player/player-base-x.svg");
    expect(filenameForArchive("player-base-01.svg")).toBe("player-base-01.svg");
  });
});

describe("buildFilenames", () => {
  it("names fresh files after the skin in custom mode", () => {
    expect(buildFilenames(filenameArgs())).toEqual({
      base: "img/player/player-base-basicoutfit.img",
      hands: "img/player/player-hands-basicoutfit.img",
      feet: "img/player/player-feet-basicoutfit.img",
      backpack: "img/player/player-circle-base-basicoutfit.img",
      loot: "img/loot/loot-shirt-basicoutfit.img",
      border: "img/loot/loot-circle-outer-01.img",
      inner: "img/loot/loot-circle-inner-01.img",
    });
  });

  it("references stock ids in base mode", () => {
    const names = buildFilenames(
      filenameArgs({ spriteMode: "base", refExt: ".svg", existingSpriteIds: { hands: "player-hands-07" } }),
    );
    expect(names).toMatchObject({
      base: "player-base-01.svg",
      hands: "player-hands-07.svg",
      feet: "player-feet-01.svg",
      backpack: "player-circle-base-01.svg",
      loot: "loot-shirt-01.svg",
    });
  });

  it("never collides with the stock names in custom mode", () => {
    const custom = buildFilenames(filenameArgs({ baseId: "01" }));
    const stock = buildFilenames(filenameArgs({ spriteMode: "base" }));
    for (const key of ["base", "hands", "feet", "backpack", "loot"] as const) {
      expect(custom[key]).not.toBe(stock[key]);
    }
  });

  it("omits the border unless it is on and named", () => {
    const off = buildFilenames(filenameArgs({ lootBorderOn: false }));
    expect(off.border).toBeUndefined();
    expect(off.inner).toBeUndefined();

    const unnamed = buildFilenames(filenameArgs({ lootBorderName: "  " }));
    expect(unnamed.border).toBeUndefined();
    expect(unnamed.inner).toBeUndefined();
  });

  it("adds the accessory when it is enabled", () => {
    expect(buildFilenames(filenameArgs({ frontEnabled: true })).front).toBe("img/player/player-front-basicoutfit.img");
  });
});

describe("tints", () => {
  it("reads each part's tint from the draft", () => {
    expect(buildTints(defaultSkinDraft)).toEqual(UI_TINTS);
  });

  it("neutralizes every tint for custom art", () => {
    expect(adjustTintsForSpriteMode(UI_TINTS, "custom")).toEqual({
      base: "0xffffff",
      hand: "0xffffff",
      foot: "0xffffff",
      backpack: "0xffffff",
      loot: "0xffffff",
      border: "0xffffff",
    });
  });

  it("passes tints through for stock art", () => {
    const adjusted = adjustTintsForSpriteMode(UI_TINTS, "base");
    expect(adjusted).toEqual(UI_TINTS);
    expect(adjusted).not.toBe(UI_TINTS);
  });

  it("reads hands and feet tints separately", () => {
    const draft: SkinDraft = {
      ...defaultSkinDraft,
      parts: { ...defaultSkinDraft.parts, feet: { ...defaultSkinDraft.parts.feet, tint: "#010203" } },
    };
    expect(buildTints(draft).foot).toBe("0x010203");
    expect(buildTints(draft).hand).toBe("0xf8c574");
  });
});

describe("buildConfigBlock", () => {
  const filenames = buildFilenames(filenameArgs());

  it("writes the stock skin with neutral tints", () => {
    const block = buildConfigBlock(opts(), "outfitBasicOutfit", filenames, adjustTintsForSpriteMode(UI_TINTS, "custom"));
    expect(block).toBe(
      [
        'export const outfitBasicOutfit = defineOutfitSkin("outfitBase", {',
        '  name: "Basic Outfit",',
        "  skinImg: {",
        "    baseTint: 0xffffff,",
        '    baseSprite: "player-base-basicoutfit.img",',
        "    handTint: 0xffffff,",
        '    handSprite: "player-hands-basicoutfit.img",',
        "    footTint: 0xffffff,",
        '    footSprite: "player-feet-basicoutfit.img",',
        "    backpackTint: 0xffffff,",
        '    backpackSprite: "player-circle-base-basicoutfit.img",',
        "  },",
        "  lootImg: {",
        '    sprite: "loot-shirt-basicoutfit.img",',
        "    tint: 0xffffff,",
        '    border: "loot-circle-outer-01.img",',
        "    borderTint: 0xffffff,",
        "    scale: 0.2,",
        "  },",
        "  sound: {",
        '    pickup: "clothes_pickup_01",',
        "  },",
        "});",
      ].join("\n"),
    );
  });

  it("carries the chosen tints for stock art", () => {
    const block = buildConfigBlock(opts(), "outfitBasicOutfit", filenames, UI_TINTS);
    expect(block).toContain("    baseTint: 0xf8c574,");
    expect(block).toContain("    backpackTint: 0x816537,");
    expect(block).toContain("    borderTint: 0x000000,");
    expect(block).not.toContain("rarity:");
  });

  it("writes optional fields in a fixed order only when set", () => {
    const block = buildConfigBlock(
      opts({
        no_drop: true,
        rarity: "Epic",
        lore: 'He said "hi"',
        ghillie: true,
        obstacle_type: " barrel ",
        base_scale: 1.25,
      }),
      "outfitX",
      filenames,
      UI_TINTS,
    );
    const lines = block.split("\n");
    expect(lines.slice(1, 8)).toEqual([
      '  name: "Basic Outfit",',
      "  noDrop: true,",
      "  rarity: Rarity.Epic,",
      '  lore: "He said \\"hi\\"",',
      "  ghillie: true,",
      '  obstacleType: "barrel",',
      "  baseScale: 1.25,",
    ]);
    expect(block).not.toContain("noDropOnDeath");
  });

  it("writes true flags verbatim", () => {
    const block = buildConfigBlock(opts({ no_drop_on_death: true }), "outfitX", filenames, UI_TINTS);
    expect(block.split("\n")[2]).toBe("  noDropOnDeath: true,");
  });

  it("escapes quotes in sprite names", () => {
    const names = buildFilenames(
      filenameArgs({ spriteMode: "base", existingSpriteIds: { base: 'player-"base"-02' }, lootBorderName: 'ring"x' }),
    );
    const lines = buildConfigBlock(opts(), "outfitX", names, UI_TINTS).split("\n");
    expect(lines).toContain('    baseSprite: "player-\\"base\\"-02.img",');
    expect(lines).toContain('    border: "ring\\"x.img",');
  });

  it("drops the border lines and the sound block when unset", () => {
    const noBorder = buildFilenames(filenameArgs({ lootBorderOn: false }));
    const block = buildConfigBlock(opts({ loot_border_on: false, sound_pickup: "" }), "outfitX", noBorder, UI_TINTS);
    expect(block.split("\n").slice(-5)).toEqual([
      "  lootImg: {",
      '    sprite: "loot-shirt-basicoutfit.img",',
      "    tint: 0xffffff,",
      "  },",
      "});",
    ]);
  });
});

describe("buildManifest", () => {
  it("records the resolved state as indented JSON", () => {
    const filenames = buildFilenames(filenameArgs());
    const exportTints = adjustTintsForSpriteMode(UI_TINTS, "custom");
    const text = buildManifest({
      ident: "outfitBasicOutfit",
      opts: opts({ no_drop: true, loot_scale: 0.25 }),
      filenames,
      uiTints: UI_TINTS,
      exportTints,
      spriteMode: "custom",
      previewPreset: "Standing",
      preview: { overlayEnabled: true, overlayAboveFront: true },
      front: { enabled: false, posX: 4, posY: -2, aboveHand: false },
    });

    expect(text.split("\n")[1]).toBe('  "skin": {');
    const data: SkinManifest = JSON.parse(text);
    expect(data.skin).toEqual({
      ident: "outfitBasicOutfit",
      name: "Basic Outfit",
      lore: "",
      rarity: null,
      flags: { noDropOnDeath: false, noDrop: true, ghillie: false },
      obstacleType: "",
      baseScale: 1,
    });
    expect(data.sprites).toEqual({ mode: "custom", referenceExtension: ".img", files: filenames });
    expect(data.tints).toEqual({ ui: UI_TINTS, export: exportTints });
    expect(data.loot).toEqual({
      borderEnabled: true,
      borderSprite: "img/loot/loot-circle-outer-01.img",
      innerSprite: "img/loot/loot-circle-inner-01.img",
      scale: 0.25,
    });
    expect(data.preview).toEqual({ preset: "Standing", overlayEnabled: true, overlayAboveFront: true });
    expect(data.front).toEqual({ enabled: false, pos: { x: 4, y: -2 }, aboveHand: false });
  });
});
