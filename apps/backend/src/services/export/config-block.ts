import type { ExportOpts, SpriteFilenames, TintMap } from "@outfit-forge/shared-schema";
import { bareFilename } from "./naming";

const str = (value: string): string => JSON.stringify(value);

/**
 * The `defineOutfitSkin(...)` source for one skin. Field order is fixed and
 * optional lines are left out rather than written with defaults.
 */
export function buildConfigBlock(
  opts: ExportOpts,
  ident: string,
  filenames: SpriteFilenames,
  tints: TintMap,
): string {
  const lines: string[] = [];
  lines.push(`export const ${ident} = defineOutfitSkin("outfitBase", {`);
  lines.push(`  name: ${str(opts.skin_name)},`);
  if (opts.no_drop_on_death) lines.push("  noDropOnDeath: true,");
  if (opts.no_drop) lines.push("  noDrop: true,");
  if (opts.rarity) lines.push(`  rarity: Rarity.${opts.rarity},`);
  if (opts.lore) lines.push(`  lore: ${str(opts.lore)},`);
  if (opts.ghillie) lines.push("  ghillie: true,");
  const obstacleType = opts.obstacle_type.trim();
  if (obstacleType) lines.push(`  obstacleType: ${str(obstacleType)},`);
  if (opts.base_scale !== 1) lines.push(`  baseScale: ${opts.base_scale},`);

  lines.push("  skinImg: {");
  lines.push(`    baseTint: ${tints.base},`);
  lines.push(`    baseSprite: ${str(bareFilename(filenames.base))},`);
  lines.push(`    handTint: ${tints.hand},`);
  lines.push(`    handSprite: ${str(bareFilename(filenames.hands))},`);
  lines.push(`    footTint: ${tints.foot},`);
  lines.push(`    footSprite: ${str(bareFilename(filenames.feet))},`);
  lines.push(`    backpackTint: ${tints.backpack},`);
  lines.push(`    backpackSprite: ${str(bareFilename(filenames.backpack))},`);
  lines.push("  },");

  lines.push("  lootImg: {");
  lines.push(`    sprite: ${str(bareFilename(filenames.loot))},`);
  lines.push(`    tint: ${tints.loot},`);
  if (opts.loot_border_on && filenames.border) {
    lines.push(`    border: ${str(bareFilename(filenames.border))},`);
    lines.push(`    borderTint: ${tints.border},`);
    lines.push(`    scale: ${opts.loot_scale},`);
  }
  lines.push("  },");

  if (opts.sound_pickup) {
    lines.push("  sound: {");
    lines.push(`    pickup: ${str(opts.sound_pickup)},`);
    lines.push("  },");
  }

  lines.push("});");
  return lines.join("\n");
}
