import { useTranslation } from "react-i18next";
import { FrontPanel } from "../components/designer/FrontPanel";
import { HandsExtras } from "../components/designer/HandsExtras";
import { MetaPanel } from "../components/designer/MetaPanel";
import { OutlinePanel } from "../components/designer/OutlinePanel";
import { PartPanel } from "../components/designer/PartPanel";
import { PreviewPanel } from "../components/designer/PreviewPanel";
import { SpritePanel } from "../components/designer/SpritePanel";
import { SpriteStrip } from "../components/designer/SpriteStrip";
import { useSkinStore } from "../stores/skin-store";

export function DesignerPage(): JSX.Element {
  const { t } = useTranslation();
  const parts = useSkinStore((s) => s.draft.parts);
  const result = useSkinStore((s) => s.result);
  const loaded = useSkinStore((s) => s.loaded);
  const updatePart = useSkinStore((s) => s.updatePart);
  const reset = useSkinStore((s) => s.reset);

  if (!loaded) return <p className="hint">{t("common_loading")}</p>;

  return (
    <div className="designer-grid">
      <div className="designer-controls">
        <div className="panel-actions">
          <button className="list-btn" onClick={reset}>
            {t("designer_reset")}
          </button>
        </div>
        <MetaPanel />
        <SpritePanel />
        <OutlinePanel />
        <PartPanel title={t("part_body")} cfg={parts.body} onPatch={(next) => updatePart("body", next)} />
        <PartPanel title={t("part_hands")} cfg={parts.hands} onPatch={(next) => updatePart("hands", next)}>
          <HandsExtras cfg={parts.hands} onPatch={(next) => updatePart("hands", next)} />
        </PartPanel>
        <PartPanel title={t("part_feet")} cfg={parts.feet} onPatch={(next) => updatePart("feet", next)} />
        <PartPanel title={t("part_backpack")} cfg={parts.backpack} onPatch={(next) => updatePart("backpack", next)} />
        <FrontPanel />
      </div>
      <div className="designer-preview">
        <PreviewPanel />
        {result && <SpriteStrip sprites={result.sprites} />}
      </div>
    </div>
  );
}
