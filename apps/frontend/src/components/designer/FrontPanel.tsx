import { useTranslation } from "react-i18next";
import type { FrontAccessory } from "@outfit-forge/shared-schema";
import { useSkinStore } from "../../stores/skin-store";
import { CheckField, RangeField, SelectField } from "./fields";
import { PartPanel } from "./PartPanel";

type FrontSource = FrontAccessory["source"];

export function FrontPanel(): JSX.Element {
  const { t } = useTranslation();
  const front = useSkinStore((s) => s.draft.front);
  const accessory = useSkinStore((s) => s.draft.parts.accessory);
  const updateSection = useSkinStore((s) => s.updateSection);
  const updatePart = useSkinStore((s) => s.updatePart);
  const patch = (next: Partial<FrontAccessory>): void => updateSection("front", next);

  const sourceOptions: Array<{ value: FrontSource; label: string }> = [
    { value: "generated", label: t("front_source_generated") },
    { value: "upload", label: t("front_source_upload") },
  ];

  return (
    <article className="panel">
      <h3>{t("front_title")}</h3>
      <CheckField label={t("front_enabled")} checked={front.enabled} onChange={(enabled) => patch({ enabled })} />
      {front.enabled && (
        <>
          <SelectField label={t("front_source")} value={front.source} options={sourceOptions} onChange={(source) => patch({ source })} />
          <RangeField label={t("front_pos_x")} value={front.pos_x} min={-200} max={200} onChange={(pos_x) => patch({ pos_x })} />
          <RangeField label={t("front_pos_y")} value={front.pos_y} min={-200} max={200} onChange={(pos_y) => patch({ pos_y })} />
          <CheckField
            label={t("front_size_auto")}
            checked={front.size === null}
            onChange={(auto) => patch({ size: auto ? null : 64 })}
          />
          {front.size !== null && (
            <RangeField label={t("front_size")} value={front.size} min={8} max={400} onChange={(size) => patch({ size })} />
          )}
          <RangeField label={t("front_rotation")} value={front.rotation} min={-180} max={180} onChange={(rotation) => patch({ rotation })} />
          <CheckField label={t("front_above_hand")} checked={front.above_hand} onChange={(above_hand) => patch({ above_hand })} />
          <PartPanel title={t("part_accessory")} cfg={accessory} onPatch={(next) => updatePart("accessory", next)}>
            <RangeField
              label={t("accessory_flare_scale")}
              value={accessory.flare_scale}
              min={0.5}
              max={1.5}
              step={0.05}
              onChange={(flare_scale) => updatePart("accessory", { flare_scale })}
            />
            <RangeField
              label={t("accessory_tip_scale")}
              value={accessory.tip_scale}
              min={0.1}
              max={1}
              step={0.05}
              onChange={(tip_scale) => updatePart("accessory", { tip_scale })}
            />
          </PartPanel>
        </>
      )}
    </article>
  );
}
