/* Shared SVG document helpers. Every generated sprite is assembled line by line. */

export function svgHeader(width: number, height: number): string {
  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" ` +
    `viewBox="0 0 ${width} ${height}" shape-rendering="geometricPrecision" ` +
    `text-rendering="geometricPrecision">`
  );
}

export const SVG_FOOTER = "</svg>";

/** Join header, body lines and footer into one document. */
export function svgDocument(width: number, height: number, body: string[]): string {
  return [svgHeader(width, height), ...body.filter((line) => line.length > 0), SVG_FOOTER].join("\n");
}

export function strokeAttrs(color: string, width: number): string {
  return `stroke="${color}" stroke-width="${width}"`;
}

/** Fixed two-decimal coordinates, as every builder writes them. */
export function f2(value: number): string {
  return value.toFixed(2);
}

export function svgDataUri(svgText: string): string {
  return `data:image/svg+xml;utf8,${encodeURIComponent(svgText)}`;
}

export function base64DataUri(bytes: Uint8Array, mime: string): string {
  return `data:${mime};base64,${Buffer.from(bytes).toString("base64")}`;
}
