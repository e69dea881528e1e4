import { useTranslation } from "react-i18next";
import type { RenderedSprites } from "@outfit-forge/shared-schema";

type Props = { sprites: RenderedSprites };

const SLOTS: ReadonlyArray<keyof RenderedSprites> = ["body", "hands", "feet", "backpack", "loot", "loot_inner", "loot_outer", "accessory"];

function dataUri(svg: string): string {
  return `data:image/svg+xml;charset=utf-8,${encodeURIComponent(svg)}`;
}

export function SpriteStrip({ sprites }: Props): JSX.Element {
  const { t } = useTranslation();
  return (
    <div className="sprite-strip">
      {SLOTS.map((slot) => {
        const svg = sprites[slot];
        if (svg === null) return null;
        return (
          <figure key={slot} className="sprite-thumb">
            <img src={dataUri(svg)} alt={slot} />
            <figcaption>{t(`sprite_slot_${slot}`)}</figcaption>
          </figure>
        );
      })}
    </div>
  );
}
