export { applyPrefix, bareFilename, ensureExtension, filenameForArchive, sanitize, skinIdentifiers } from "./naming";
export type { SkinIdentifiers } from "./naming";
export { buildFilenames, STOCK_SPRITE_IDS } from "./filenames";
export type { FilenameArgs } from "./filenames";
export { adjustTintsForSpriteMode, buildTints, NEUTRAL_TINT } from "./tints";
export { buildConfigBlock } from "./config-block";
export { buildManifest, manifestData } from "./manifest";
export type { ManifestArgs, SkinManifest } from "./manifest";
export { archiveEntries, archiveName, buildSkinArchive } from "./archive";
export type { ArchiveOptions, SkinBundle } from "./archive";
