/** A color string that is not `#RRGGBB` / `RRGGBB`. */
export class InvalidColorError extends Error {
  readonly input: string;

  constructor(input: string) {
    super(`invalid hex color: ${JSON.stringify(input)}`);
    this.name = "InvalidColorError";
    this.input = input;
  }
}

/** Uploaded bytes whose mime type or signature is not a supported image format. */
export class UnsupportedAssetError extends Error {
  readonly mime: string;

  constructor(mime: string, reason: string) {
    super(`unsupported asset (${mime || "unknown mime"}): ${reason}`);
    this.name = "UnsupportedAssetError";
    this.mime = mime;
  }
}
