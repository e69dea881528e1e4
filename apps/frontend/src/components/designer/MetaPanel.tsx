import { useTranslation } from "react-i18next";
import { RARITIES, type ExportOpts, type Rarity } from "@outfit-forge/shared-schema";
import { useSkinStore } from "../../stores/skin-store";
import { CheckField, ColorField, Field, RangeField, SelectField } from "./fields";

type RarityChoice = Rarity | "omit";

export function MetaPanel(): JSX.Element {
  const { t } = useTranslation();
  const meta = useSkinStore((s) => s.draft.meta);
  const lootTint = useSkinStore((s) => s.draft.loot_tint);
  const updateSection = useSkinStore((s) => s.updateSection);
  const setLootTint = useSkinStore((s) => s.setLootTint);
  const patch = (next: Partial<ExportOpts>): void => updateSection("meta", next);

  const rarityOptions: Array<{ value: RarityChoice; label: string }> = [
    { value: "omit", label: t("meta_rarity_omit") },
    ...RARITIES.map((value) => ({ value, label: value })),
  ];

  return (
    <article className="panel">
      <h3>{t("meta_title")}</h3>
      <Field label={t("meta_skin_name")}>
        <input value={meta.skin_name} maxLength={80} onChange={(e) => patch({ skin_name: e.target.value })} />
      </Field>
      <Field label={t("meta_lore")}>
        <textarea value={meta.lore} maxLength={500} onChange={(e) => patch({ lore: e.target.value })} />
      </Field>
      <SelectField<RarityChoice>
        label={t("meta_rarity")}
        value={meta.rarity ?? "omit"}
        options={rarityOptions}
        onChange={(value) => patch({ rarity: value === "omit" ? null : value })}
      />
      <CheckField label={t("meta_no_drop_on_death")} checked={meta.no_drop_on_death} onChange={(no_drop_on_death) => patch({ no_drop_on_death })} />
      <CheckField label={t("meta_no_drop")} checked={meta.no_drop} onChange={(no_drop) => patch({ no_drop })} />
      <CheckField label={t("meta_ghillie")} checked={meta.ghillie} onChange={(ghillie) => patch({ ghillie })} />
      <Field label={t("meta_obstacle_type")}>
        <input value={meta.obstacle_type} onChange={(e) => patch({ obstacle_type: e.target.value })} />
      </Field>
      <Field label={t("meta_base_scale")}>
        <input
          type="number"
          min={0.1}
          max={10}
          step={0.05}
          value={meta.base_scale}
          onChange={(e) => {
            const value = Number(e.target.value);
            if (value > 0) patch({ base_scale: value });
          }}
        />
      </Field>

      <h4>{t("meta_loot_title")}</h4>
      <ColorField label={t("meta_loot_tint")} value={lootTint} onChange={setLootTint} />
      <CheckField label={t("meta_loot_border_on")} checked={meta.loot_border_on} onChange={(loot_border_on) => patch({ loot_border_on })} />
      {meta.loot_border_on && (
        <>
          <Field label={t("meta_loot_border_name")}>
            <input value={meta.loot_border_name} onChange={(e) => patch({ loot_border_name: e.target.value })} />
          </Field>
          <Field label={t("meta_loot_inner_name")}>
            <input value={meta.loot_inner_name} onChange={(e) => patch({ loot_inner_name: e.target.value })} />
          </Field>
          <ColorField label={t("meta_loot_border_tint")} value={meta.loot_border_tint} onChange={(loot_border_tint) => patch({ loot_border_tint })} />
          <RangeField label={t("meta_loot_scale")} value={meta.loot_scale} min={0.05} max={0.5} step={0.01} onChange={(loot_scale) => patch({ loot_scale })} />
        </>
      )}
      <Field label={t("meta_sound_pickup")}>
        <input value={meta.sound_pickup} onChange={(e) => patch({ sound_pickup: e.target.value })} />
      </Field>
    </article>
  );
}
