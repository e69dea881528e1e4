import { useTranslation } from "react-i18next";
import { SPRITE_MODES, type ExistingSpriteIds } from "@outfit-forge/shared-schema";
import { useSkinStore } from "../../stores/skin-store";
import { Field, SelectField } from "./fields";

const STOCK_KEYS: ReadonlyArray<keyof ExistingSpriteIds> = ["base", "hands", "feet", "backpack", "loot"];

export function SpritePanel(): JSX.Element {
  const { t } = useTranslation();
  const draft = useSkinStore((s) => s.draft);
  const setSpriteMode = useSkinStore((s) => s.setSpriteMode);
  const updateSection = useSkinStore((s) => s.updateSection);
  const modeOptions = SPRITE_MODES.map((value) => ({ value, label: t(`sprite_mode_${value}`) }));
  const extOptions = [
    { value: ".img" as const, label: ".img" },
    { value: ".svg" as const, label: ".svg" },
  ];

  return (
    <article className="panel">
      <h3>{t("sprite_title")}</h3>
      <SelectField label={t("sprite_mode")} value={draft.sprite_mode} options={modeOptions} onChange={setSpriteMode} />
      <p className="hint">{t(`sprite_mode_${draft.sprite_mode}_hint`)}</p>
      <SelectField
        label={t("sprite_ref_ext")}
        value={draft.meta.ref_ext}
        options={extOptions}
        onChange={(ref_ext) => updateSection("meta", { ref_ext })}
      />
      {draft.sprite_mode === "base" ? (
        STOCK_KEYS.map((key) => (
          <Field key={key} label={t("sprite_stock_id", { part: key })}>
            <input
              value={draft.existing_sprite_ids[key]}
              onChange={(e) => updateSection("existing_sprite_ids", { [key]: e.target.value })}
            />
          </Field>
        ))
      ) : (
        <>
          <Field label={t("sprite_player_dir")}>
            <input value={draft.dirs.player} onChange={(e) => updateSection("dirs", { player: e.target.value })} />
          </Field>
          <Field label={t("sprite_loot_dir")}>
            <input value={draft.dirs.loot} onChange={(e) => updateSection("dirs", { loot: e.target.value })} />
          </Field>
        </>
      )}
    </article>
  );
}
