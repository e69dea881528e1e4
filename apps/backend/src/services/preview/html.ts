import type { PreviewElement, PreviewSprite, ResolvedPreview } from "./geometry";

/** Data URIs for every sprite the preview can show. */
export type PreviewUris = Record<Exclude<PreviewSprite, "front">, string> & {
  front: string | null;
  loot: string;
  lootInner: string;
  lootOuter: string;
};

function elementRule(el: PreviewElement): string {
  return [
    `  .preview-${el.id} {`,
    `    left: ${el.left}px;`,
    `    top: ${el.top}px;`,
    `    width: ${el.width}px;`,
    `    height: ${el.height}px;`,
    `    transform: ${el.transform};`,
    `    transform-origin: center;`,
    `    z-index: ${el.z * 2};`,
    `  }`,
  ].join("\n");
}

function escapeAttr(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/"/g, "&quot;").replace(/</g, "&lt;");
}

function figure(src: string, size: number, alt: string, caption: string): string {
  return (
    `      <figure style="margin:0;text-align:center;">\n` +
    `        <img src="${escapeAttr(src)}" width="${size}" height="${size}" alt="${alt}" style="image-rendering:optimizeQuality;" />\n` +
    `        <figcaption style="font-size:0.8rem;color:#666;margin-top:4px;">${caption}</figcaption>\n` +
    `      </figure>`
  );
}

/**
 * Composed preview fragment: a stage with one absolutely positioned image per
 * visible element (already sorted back to front), plus a gallery of the single
 * sprites and the layered loot icon.
 */
export function buildPreviewHtml(uris: PreviewUris, resolved: ResolvedPreview): string {
  const elements = resolved.elements.filter((el) => el.sprite !== "front" || uris.front !== null);
  const rules = elements.map(elementRule).join("\n");
  const images = elements
    .map((el) => {
      const src = el.sprite === "front" ? uris.front ?? "" : uris[el.sprite];
      return `    <img class="preview-${el.id}" src="${escapeAttr(src)}" alt="${el.label}" />`;
    })
    .join("\n");

  return `<style>
  .preview-stage {
    position: relative;
    width: ${resolved.stageWidth}px;
    height: ${resolved.stageHeight}px;
    flex: 0 0 auto;
    background: transparent;
  }
  .preview-stage img {
    position: absolute;
    image-rendering: optimizeQuality;
  }
  .loot-stage {
    position: relative;
    width: 148px;
    height: 148px;
  }
  .loot-stage img {
    position: absolute;
    top: 50%;
    left: 50%;
    transform: translate(-50%, -50%);
  }
${rules}
</style>
<div style="display:flex;flex-wrap:wrap;gap:32px;align-items:flex-start;justify-content:center;">
  <div class="preview-stage">
${images}
  </div>
  <div style="display:flex;flex-direction:column;gap:12px;flex:0 0 auto;align-items:center;">
    <div style="display:grid;grid-template-columns:repeat(2,auto);gap:16px;justify-items:center;">
${figure(uris.body, 140, "Body sprite", "Body")}
${figure(uris.backpack, 148, "Backpack sprite", "Backpack")}
${figure(uris.hands, 76, "Hands sprite", "Hands")}
${figure(uris.feet, 38, "Feet sprite", "Feet")}
    </div>
    <figure style="margin:0;text-align:center;">
      <div class="loot-stage">
        <img src="${escapeAttr(uris.lootOuter)}" width="146" height="146" alt="Loot outer" />
        <img src="${escapeAttr(uris.lootInner)}" width="148" height="148" alt="Loot inner" />
        <img src="${escapeAttr(uris.loot)}" width="128" height="128" alt="Loot shirt" />
      </div>
      <figcaption style="font-size:0.8rem;color:#666;margin-top:4px;">Loot icon</figcaption>
    </figure>
  </div>
</div>`;
}

/** Standalone page around a preview fragment, for the archive snapshot. */
export function buildPreviewDocument(title: string, fragment: string): string {
  const safeTitle = title.replace(/&/g, "&amp;").replace(/</g, "&lt;");
  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8" />
<title>${safeTitle}</title>
</head>
<body style="margin:24px;font-family:sans-serif;background:#f4f1ea;">
${fragment}
</body>
</html>
`;
}
