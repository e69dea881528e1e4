import type { ExistingSpriteIds, SpriteFilenames, SpriteMode } from "@outfit-forge/shared-schema";
import { applyPrefix, ensureExtension } from "./naming";

export const STOCK_SPRITE_IDS: ExistingSpriteIds = {
  base: "player-base-01",
  hands: "player-hands-01",
  feet: "player-feet-01",
  backpack: "player-circle-base-01",
  loot: "loot-shirt-01",
};

export type FilenameArgs = {
  baseId: string;
  spriteMode: SpriteMode;
  existingSpriteIds: Partial<ExistingSpriteIds>;
  dirs: { player: string; loot: string };
  refExt: string;
  lootBorderOn: boolean;
  lootBorderName: string;
  lootInnerName: string;
  frontEnabled: boolean;
};

function stockId(ids: Partial<ExistingSpriteIds>, key: keyof ExistingSpriteIds): string {
  const id = ids[key]?.trim();
  return id ? id : STOCK_SPRITE_IDS[key];
}

/**
 * Filenames per sprite slot. Custom mode names fresh files after the skin id;
 * base mode points at stock art by id and adds no directory.
 */
export function buildFilenames(args: FilenameArgs): SpriteFilenames {
  const { baseId, dirs, refExt } = args;
  const player = (stem: string): string => applyPrefix(dirs.player, ensureExtension(stem, refExt));
  const loot = (stem: string): string => applyPrefix(dirs.loot, ensureExtension(stem, refExt));

  let filenames: SpriteFilenames;
  if (args.spriteMode === "custom") {
    filenames = {
      base: player(`player-base-${baseId}`),
      hands: player(`player-hands-${baseId}`),
      feet: player(`player-feet-${baseId}`),
      backpack: player(`player-circle-base-${baseId}`),
      loot: loot(`loot-shirt-${baseId}`),
    };
  } else {
    const ids = args.existingSpriteIds;
    filenames = {
      base: ensureExtension(stockId(ids, "base"), refExt),
      hands: ensureExtension(stockId(ids, "hands"), refExt),
      feet: ensureExtension(stockId(ids, "feet"), refExt),
      backpack: ensureExtension(stockId(ids, "backpack"), refExt),
      loot: ensureExtension(stockId(ids, "loot"), refExt),
    };
  }

  if (args.lootBorderOn && args.lootBorderName.trim()) {
    filenames.border = loot(args.lootBorderName);
    if (args.lootInnerName.trim()) {
      filenames.inner = loot(args.lootInnerName);
    }
  }
  if (args.frontEnabled) {
    filenames.front = player(`player-front-${baseId}`);
  }
  return filenames;
}
