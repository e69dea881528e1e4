import { UPLOAD_MIME_TYPES } from "@outfit-forge/shared-schema";
import { UnsupportedAssetError } from "../errors";
import { base64DataUri, f2, svgDocument } from "../svg";

type UploadMime = (typeof UPLOAD_MIME_TYPES)[number];

function isUploadMime(mime: string): mime is UploadMime {
  return UPLOAD_MIME_TYPES.some((known) => known === mime);
}

function startsWith(bytes: Uint8Array, signature: number[], offset = 0): boolean {
  if (bytes.length < offset + signature.length) return false;
  return signature.every((byte, i) => bytes[offset + i] === byte);
}

const ascii = (text: string): number[] => Array.from(text, (c) => c.charCodeAt(0));

function matchesSignature(bytes: Uint8Array, mime: UploadMime): boolean {
  switch (mime) {
    case "image/png":
      return startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
    case "image/jpeg":
      return startsWith(bytes, [0xff, 0xd8, 0xff]);
    case "image/gif":
      return startsWith(bytes, ascii("GIF8"));
    case "image/webp":
      return startsWith(bytes, ascii("RIFF")) && startsWith(bytes, ascii("WEBP"), 8);
    case "image/svg+xml":
      return Buffer.from(bytes).toString("utf8").toLowerCase().includes("<svg");
  }
}

/** Throws UnsupportedAssetError unless the bytes are a recognized image of `mime`. */
export function assertSupportedAsset(bytes: Uint8Array, mime: string): asserts mime is UploadMime {
  if (!isUploadMime(mime)) {
    throw new UnsupportedAssetError(mime, "mime type is not an accepted image format");
  }
  if (bytes.length === 0) {
    throw new UnsupportedAssetError(mime, "file is empty");
  }
  if (!matchesSignature(bytes, mime)) {
    throw new UnsupportedAssetError(mime, "content does not match the declared format");
  }
}

/**
 * Wrap uploaded art in a canvas of the target size, centered, with an optional
 * rotation and uniform scale about the canvas center.
 */
export function svgFromUpload(
  bytes: Uint8Array,
  mime: string,
  width: number,
  height: number,
  rotation = 0,
  scale = 1,
): string {
  assertSupportedAsset(bytes, mime);

  const cx = width / 2;
  const cy = height / 2;
  const rotated = Math.abs(rotation) > 1e-6;
  const scaled = Math.abs(scale - 1) > 1e-6;

  let transformAttr = "";
  if (rotated || scaled) {
    const transforms = [`translate(${f2(cx)},${f2(cy)})`];
    if (rotated) transforms.push(`rotate(${f2(rotation)})`);
    if (scaled) transforms.push(`scale(${scale.toFixed(4)})`);
    transforms.push(`translate(${f2(-cx)},${f2(-cy)})`);
    transformAttr = ` transform="${transforms.join(" ")}"`;
  }

  return svgDocument(width, height, [
    `<image href="${base64DataUri(bytes, mime)}" x="0" y="0" width="${width}" height="${height}" ` +
      `preserveAspectRatio="xMidYMid meet"${transformAttr} />`,
  ]);
}
