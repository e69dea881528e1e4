import type { PartConfig, SkinDraft } from "./skin";

/* Stock outfit colors: skin-tone body and hands, brown backpack. */
const BODY_DEFAULT: PartConfig = {
  primary: "#f8c574",
  secondary: "#f8c574",
  extra: "#cba86a",
  style: "solid",
  angle: 45,
  gap: 24,
  opacity: 0.6,
  size: 14,
  tint: "#f8c574",
  upload: null,
};

export const defaultSkinDraft: SkinDraft = {
  meta: {
    skin_name: "Basic Outfit",
    lore: "",
    rarity: null,
    no_drop_on_death: false,
    no_drop: false,
    ghillie: false,
    obstacle_type: "",
    base_scale: 1,
    loot_border_on: true,
    loot_border_name: "loot-circle-outer-01",
    loot_inner_name: "loot-circle-inner-01",
    loot_border_tint: "#000000",
    loot_scale: 0.2,
    sound_pickup: "clothes_pickup_01",
    ref_ext: ".img",
  },
  outline: {
    color: "#333333",
    width: 8,
    style: "solid",
    glow_color: null,
    glow_size: null,
  },
  part_outlines: { hands: null, feet: null, backpack: null },
  parts: {
    body: BODY_DEFAULT,
    hands: {
      ...BODY_DEFAULT,
      gap: 20,
      size: 10,
      shape: "circle",
      shape_scale_x: 1,
      shape_scale_y: 1,
    },
    feet: { ...BODY_DEFAULT, gap: 20, size: 10 },
    backpack: {
      ...BODY_DEFAULT,
      primary: "#816537",
      secondary: "#816537",
      extra: "#6e5630",
      gap: 22,
      size: 12,
      tint: "#816537",
    },
    accessory: {
      ...BODY_DEFAULT,
      primary: "#3c7fda",
      secondary: "#174173",
      extra: "#ffffff",
      tint: "#ffffff",
      flare_scale: 1.1,
      tip_scale: 0.45,
    },
  },
  loot_tint: "#ffffff",
  sprite_mode: "custom",
  existing_sprite_ids: {
    base: "player-base-01",
    hands: "player-hands-01",
    feet: "player-feet-01",
    backpack: "player-circle-base-01",
    loot: "loot-shirt-01",
  },
  dirs: { player: "img/player/", loot: "img/loot/" },
  preview: {
    preset: "Standing",
    overlay_enabled: true,
    overlay_above_front: true,
    include_snapshot: false,
  },
  front: {
    enabled: false,
    source: "generated",
    pos_x: 0,
    pos_y: 0,
    size: null,
    rotation: 0,
    above_hand: false,
  },
};
