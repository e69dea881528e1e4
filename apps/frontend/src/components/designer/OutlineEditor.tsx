import { useTranslation } from "react-i18next";
import { OUTLINE_STYLES, type OutlineSpec } from "@outfit-forge/shared-schema";
import { ColorField, RangeField, SelectField } from "./fields";

type Props = {
  outline: OutlineSpec;
  onChange: (outline: OutlineSpec) => void;
};

export function OutlineEditor({ outline, onChange }: Props): JSX.Element {
  const { t } = useTranslation();
  const patch = (next: Partial<OutlineSpec>): void => onChange({ ...outline, ...next });
  const styleOptions = OUTLINE_STYLES.map((value) => ({ value, label: t(`outline_${value}`) }));

  return (
    <div className="outline-editor">
      <SelectField label={t("outline_style")} value={outline.style} options={styleOptions} onChange={(style) => patch({ style })} />
      <ColorField label={t("outline_color")} value={outline.color} onChange={(color) => patch({ color })} />
      <RangeField label={t("outline_width")} value={outline.width} min={1} max={24} onChange={(width) => patch({ width })} />
      {outline.style === "glow" && (
        <>
          <ColorField
            label={t("outline_glow_color")}
            value={outline.glow_color ?? outline.color}
            onChange={(glow_color) => patch({ glow_color })}
          />
          <RangeField
            label={t("outline_glow_size")}
            value={outline.glow_size ?? outline.width}
            min={1}
            max={48}
            onChange={(glow_size) => patch({ glow_size })}
          />
        </>
      )}
    </div>
  );
}
