import { useTranslation } from "react-i18next";
import { PREVIEW_PRESET_NAMES, type PreviewOptions } from "@outfit-forge/shared-schema";
import { useSkinStore } from "../../stores/skin-store";
import { CheckField, SelectField } from "./fields";

export function PreviewPanel(): JSX.Element {
  const { t } = useTranslation();
  const preview = useSkinStore((s) => s.draft.preview);
  const presets = useSkinStore((s) => s.presets);
  const result = useSkinStore((s) => s.result);
  const rendering = useSkinStore((s) => s.rendering);
  const updateSection = useSkinStore((s) => s.updateSection);
  const patch = (next: Partial<PreviewOptions>): void => updateSection("preview", next);

  const presetOptions = PREVIEW_PRESET_NAMES.map((value) => ({ value, label: value }));
  const description = presets.find((p) => p.name === preview.preset)?.description;

  return (
    <section className="panel preview-panel">
      <div className="panel-header">
        <h3>{t("preview_title")}</h3>
        {rendering && <span className="badge">{t("preview_rendering")}</span>}
      </div>
      <SelectField label={t("preview_preset")} value={preview.preset} options={presetOptions} onChange={(preset) => patch({ preset })} />
      {description && <p className="hint">{description}</p>}
      <CheckField label={t("preview_overlay")} checked={preview.overlay_enabled} onChange={(overlay_enabled) => patch({ overlay_enabled })} />
      <CheckField
        label={t("preview_overlay_above_front")}
        checked={preview.overlay_above_front}
        onChange={(overlay_above_front) => patch({ overlay_above_front })}
      />
      <CheckField
        label={t("preview_include_snapshot")}
        checked={preview.include_snapshot}
        onChange={(include_snapshot) => patch({ include_snapshot })}
      />
      {result ? (
        <div className="preview-stage" dangerouslySetInnerHTML={{ __html: result.preview_html }} />
      ) : (
        <div className="preview-stage empty">{t("preview_empty")}</div>
      )}
    </section>
  );
}
