import type { ReactNode } from "react";
import { useTranslation } from "react-i18next";
import { FILL_STYLES, UPLOAD_MIME_TYPES, type FillStyle, type PartConfig } from "@outfit-forge/shared-schema";
import { MAX_UPLOAD_BYTES } from "../../lib/constants";
import { readFileBase64 } from "../../lib/download";
import { useErrorStore } from "../../stores/error-store";
import { ColorField, Field, RangeField, SelectField } from "./fields";

type Props = {
  title: string;
  cfg: PartConfig;
  onPatch: (patch: Partial<PartConfig>) => void;
  children?: ReactNode;
};

/* Styles that read the stripe/dot color rather than the secondary one. */
const USES_EXTRA: ReadonlySet<FillStyle> = new Set<FillStyle>([
  "diagonal_stripes",
  "horizontal_stripes",
  "vertical_stripes",
  "crosshatch",
  "dots",
]);

export function PartPanel({ title, cfg, onPatch, children }: Props): JSX.Element {
  const { t } = useTranslation();
  const pushError = useErrorStore((s) => s.pushError);
  const styleOptions = FILL_STYLES.map((value) => ({ value, label: t(`fill_${value}`) }));

  const pickUpload = async (file: File | undefined): Promise<void> => {
    if (!file) return;
    try {
      if (file.size > MAX_UPLOAD_BYTES) {
        throw new Error(t("upload_too_large", { name: file.name }));
      }
      const data = await readFileBase64(file);
      onPatch({ upload: { data, mime: file.type, rotation: 0, scale: 1 } });
    } catch (e) {
      pushError(title, e, t("upload_failed"));
    }
  };

  return (
    <article className="panel part-panel">
      <h3>{title}</h3>
      <SelectField label={t("part_style")} value={cfg.style} options={styleOptions} onChange={(style) => onPatch({ style })} />
      <ColorField label={t("part_primary")} value={cfg.primary} onChange={(primary) => onPatch({ primary })} />
      {cfg.style !== "solid" && !USES_EXTRA.has(cfg.style) && (
        <ColorField label={t("part_secondary")} value={cfg.secondary} onChange={(secondary) => onPatch({ secondary })} />
      )}
      {USES_EXTRA.has(cfg.style) && (
        <>
          <ColorField label={t("part_extra")} value={cfg.extra} onChange={(extra) => onPatch({ extra })} />
          <RangeField label={t("part_gap")} value={cfg.gap} min={6} max={48} onChange={(gap) => onPatch({ gap })} />
          <RangeField label={t("part_opacity")} value={cfg.opacity} min={0} max={1} step={0.05} onChange={(opacity) => onPatch({ opacity })} />
        </>
      )}
      {(cfg.style === "linear_gradient" || cfg.style === "diagonal_stripes") && (
        <RangeField label={t("part_angle")} value={cfg.angle} min={0} max={180} onChange={(angle) => onPatch({ angle })} />
      )}
      {(cfg.style === "dots" || cfg.style === "checker") && (
        <RangeField label={t("part_size")} value={cfg.size} min={4} max={40} onChange={(size) => onPatch({ size })} />
      )}
      <ColorField label={t("part_tint")} value={cfg.tint} onChange={(tint) => onPatch({ tint })} />
      {children}

      <Field label={t("part_upload")}>
        <input
          type="file"
          accept={UPLOAD_MIME_TYPES.join(",")}
          onChange={(e) => void pickUpload(e.target.files?.[0])}
        />
      </Field>
      {cfg.upload && (
        <div className="upload-controls">
          <RangeField
            label={t("upload_rotation")}
            value={cfg.upload.rotation}
            min={-180}
            max={180}
            onChange={(rotation) => cfg.upload && onPatch({ upload: { ...cfg.upload, rotation } })}
          />
          <RangeField
            label={t("upload_scale")}
            value={cfg.upload.scale}
            min={0.1}
            max={4}
            step={0.05}
            onChange={(scale) => cfg.upload && onPatch({ upload: { ...cfg.upload, scale } })}
          />
          <button className="list-btn" onClick={() => onPatch({ upload: null })}>
            {t("upload_clear")}
          </button>
        </div>
      )}
    </article>
  );
}
