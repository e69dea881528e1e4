import type { SkinDraft } from "@outfit-forge/shared-schema";

export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }
  return { message: String(error) };
}

/** Log-safe view of a draft: names and modes, never upload payloads. */
export function summarizeDraft(draft: SkinDraft): Record<string, unknown> {
  const { parts } = draft;
  return {
    skin_name: draft.meta.skin_name,
    sprite_mode: draft.sprite_mode,
    preset: draft.preview.preset,
    front_enabled: draft.front.enabled,
    styles: {
      body: parts.body.style,
      hands: parts.hands.style,
      feet: parts.feet.style,
      backpack: parts.backpack.style
    },
    uploads: (["body", "hands", "feet", "backpack", "accessory"] as const).filter((part) => parts[part].upload !== null)
  };
}
