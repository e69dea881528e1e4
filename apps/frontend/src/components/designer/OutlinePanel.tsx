import { useTranslation } from "react-i18next";
import { useSkinStore, type OutlinePart } from "../../stores/skin-store";
import { CheckField } from "./fields";
import { OutlineEditor } from "./OutlineEditor";

const OVERRIDABLE: readonly OutlinePart[] = ["hands", "feet", "backpack"];

export function OutlinePanel(): JSX.Element {
  const { t } = useTranslation();
  const outline = useSkinStore((s) => s.draft.outline);
  const partOutlines = useSkinStore((s) => s.draft.part_outlines);
  const updateSection = useSkinStore((s) => s.updateSection);
  const setPartOutline = useSkinStore((s) => s.setPartOutline);

  return (
    <article className="panel">
      <h3>{t("outline_title")}</h3>
      <OutlineEditor outline={outline} onChange={(next) => updateSection("outline", next)} />
      {OVERRIDABLE.map((part) => {
        const override = partOutlines[part];
        return (
          <div key={part} className="outline-override">
            <CheckField
              label={t("outline_override", { part: t(`part_${part}`) })}
              checked={override !== null}
              onChange={(checked) => setPartOutline(part, checked ? { ...outline } : null)}
            />
            {override && <OutlineEditor outline={override} onChange={(next) => setPartOutline(part, next)} />}
          </div>
        );
      })}
    </article>
  );
}
