import { z } from "zod";

// --- Primitive schemas ---

/** `#RRGGBB` or `RRGGBB` on input; always lowercase `#rrggbb` after parsing. */
export const hexColorSchema = z
  .string()
  .trim()
  .regex(/^#?[0-9a-fA-F]{6}$/, "expected a 6-digit hex color")
  .transform((value) => `#${value.replace(/^#/, "").toLowerCase()}`);

export const FILL_STYLES = [
  "solid",
  "linear_gradient",
  "radial_gradient",
  "diagonal_stripes",
  "horizontal_stripes",
  "vertical_stripes",
  "crosshatch",
  "dots",
  "checker",
] as const;

export const OUTLINE_STYLES = ["solid", "glow", "gradient", "dashed", "double_stroke"] as const;

export const HAND_SHAPES = ["circle", "rounded_square", "diamond", "teardrop"] as const;

export const RARITIES = ["Stock", "Common", "Uncommon", "Rare", "Epic", "Legendary", "Mythic"] as const;

export const PREVIEW_PRESET_NAMES = ["Loadout", "Standing", "Knocked"] as const;

export const SPRITE_MODES = ["custom", "base"] as const;

export const UPLOAD_MIME_TYPES = [
  "image/png",
  "image/jpeg",
  "image/gif",
  "image/webp",
  "image/svg+xml",
] as const;

export const fillStyleSchema = z.enum(FILL_STYLES);
export const outlineStyleSchema = z.enum(OUTLINE_STYLES);
export const handShapeSchema = z.enum(HAND_SHAPES);
export const raritySchema = z.enum(RARITIES);
export const previewPresetNameSchema = z.enum(PREVIEW_PRESET_NAMES);
export const spriteModeSchema = z.enum(SPRITE_MODES);

// --- Part configuration ---

/**
 * Uploaded art replacing a generated sprite. `data` is base64; the mime type is
 * checked against the bytes when the sprite is built, not here.
 */
export const uploadedSpriteSchema = z.object({
  data: z.string().min(1),
  mime: z.string().min(1),
  rotation: z.number().min(-180).max(180).default(0),
  scale: z.number().min(0.1).max(4).default(1),
});

export const partConfigSchema = z.object({
  primary: hexColorSchema,
  secondary: hexColorSchema,
  extra: hexColorSchema,
  style: fillStyleSchema,
  angle: z.number().int().min(0).max(180),
  gap: z.number().int().min(6).max(48),
  opacity: z.number().min(0).max(1),
  size: z.number().int().min(4).max(40),
  /** Runtime tint written to the config block; never baked into the art. */
  tint: hexColorSchema,
  upload: uploadedSpriteSchema.nullable().default(null),
});

export const handsConfigSchema = partConfigSchema.extend({
  shape: handShapeSchema.default("circle"),
  shape_scale_x: z.number().min(0.5).max(1.5).default(1),
  shape_scale_y: z.number().min(0.5).max(1.5).default(1),
});

export const accessoryConfigSchema = partConfigSchema.extend({
  flare_scale: z.number().min(0.5).max(1.5).default(1.1),
  tip_scale: z.number().min(0.1).max(1).default(0.45),
});

export const outlineSpecSchema = z.object({
  color: hexColorSchema,
  width: z.number().min(1).max(24),
  style: outlineStyleSchema,
  glow_color: hexColorSchema.nullable().default(null),
  glow_size: z.number().min(1).max(48).nullable().default(null),
});

// --- Export options (game skin definition fields) ---

export const exportOptsSchema = z.object({
  skin_name: z.string().max(80),
  lore: z.string().max(500),
  rarity: raritySchema.nullable(),
  no_drop_on_death: z.boolean(),
  no_drop: z.boolean(),
  ghillie: z.boolean(),
  obstacle_type: z.string().max(80),
  base_scale: z.number().positive().max(10),
  loot_border_on: z.boolean(),
  loot_border_name: z.string().max(120),
  loot_inner_name: z.string().max(120),
  loot_border_tint: hexColorSchema,
  loot_scale: z.number().min(0.05).max(0.5),
  sound_pickup: z.string().max(120),
  ref_ext: z.enum([".img", ".svg"]),
});

export const existingSpriteIdsSchema = z.object({
  base: z.string(),
  hands: z.string(),
  feet: z.string(),
  backpack: z.string(),
  loot: z.string(),
});

export const frontAccessorySchema = z.object({
  enabled: z.boolean(),
  source: z.enum(["generated", "upload"]),
  pos_x: z.number().min(-200).max(200),
  pos_y: z.number().min(-200).max(200),
  /** Rendered edge length in preview pixels; `null` follows the body width. */
  size: z.number().min(8).max(400).nullable(),
  rotation: z.number().min(-180).max(180),
  above_hand: z.boolean(),
});

export const previewOptionsSchema = z.object({
  preset: previewPresetNameSchema,
  overlay_enabled: z.boolean(),
  overlay_above_front: z.boolean(),
  include_snapshot: z.boolean(),
});

// --- Draft: the full configurator state ---

export const skinDraftSchema = z.object({
  meta: exportOptsSchema,
  outline: outlineSpecSchema,
  /** Per-part outline overrides; a missing entry uses `outline`. */
  part_outlines: z
    .object({
      hands: outlineSpecSchema.nullable().default(null),
      feet: outlineSpecSchema.nullable().default(null),
      backpack: outlineSpecSchema.nullable().default(null),
    })
    .default({ hands: null, feet: null, backpack: null }),
  parts: z.object({
    body: partConfigSchema,
    hands: handsConfigSchema,
    feet: partConfigSchema,
    backpack: partConfigSchema,
    accessory: accessoryConfigSchema,
  }),
  loot_tint: hexColorSchema,
  sprite_mode: spriteModeSchema,
  existing_sprite_ids: existingSpriteIdsSchema,
  dirs: z.object({
    player: z.string().max(120),
    loot: z.string().max(120),
  }),
  preview: previewOptionsSchema,
  front: frontAccessorySchema,
});

export type FillStyle = z.infer<typeof fillStyleSchema>;
export type OutlineStyle = z.infer<typeof outlineStyleSchema>;
export type HandShape = z.infer<typeof handShapeSchema>;
export type Rarity = z.infer<typeof raritySchema>;
export type PreviewPresetName = z.infer<typeof previewPresetNameSchema>;
export type SpriteMode = z.infer<typeof spriteModeSchema>;
export type UploadedSprite = z.infer<typeof uploadedSpriteSchema>;
export type PartConfig = z.infer<typeof partConfigSchema>;
export type HandsConfig = z.infer<typeof handsConfigSchema>;
export type AccessoryConfig = z.infer<typeof accessoryConfigSchema>;
export type OutlineSpec = z.infer<typeof outlineSpecSchema>;
export type ExportOpts = z.infer<typeof exportOptsSchema>;
export type ExistingSpriteIds = z.infer<typeof existingSpriteIdsSchema>;
export type FrontAccessory = z.infer<typeof frontAccessorySchema>;
export type PreviewOptions = z.infer<typeof previewOptionsSchema>;
export type SkinDraft = z.infer<typeof skinDraftSchema>;
export type SkinDraftInput = z.input<typeof skinDraftSchema>;
