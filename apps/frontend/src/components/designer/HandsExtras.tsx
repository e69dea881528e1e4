import { useTranslation } from "react-i18next";
import { HAND_SHAPES, type HandsConfig } from "@outfit-forge/shared-schema";
import { RangeField, SelectField } from "./fields";

type Props = {
  cfg: HandsConfig;
  onPatch: (patch: Partial<HandsConfig>) => void;
};

export function HandsExtras({ cfg, onPatch }: Props): JSX.Element {
  const { t } = useTranslation();
  const shapeOptions = HAND_SHAPES.map((value) => ({ value, label: t(`hand_shape_${value}`) }));

  return (
    <>
      <SelectField label={t("hand_shape")} value={cfg.shape} options={shapeOptions} onChange={(shape) => onPatch({ shape })} />
      <RangeField
        label={t("hand_scale_x")}
        value={cfg.shape_scale_x}
        min={0.5}
        max={1.5}
        step={0.05}
        onChange={(shape_scale_x) => onPatch({ shape_scale_x })}
      />
      <RangeField
        label={t("hand_scale_y")}
        value={cfg.shape_scale_y}
        min={0.5}
        max={1.5}
        step={0.05}
        onChange={(shape_scale_y) => onPatch({ shape_scale_y })}
      />
    </>
  );
}
