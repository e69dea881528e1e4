import JSZip from "jszip";
import type { SpriteFilenames } from "@outfit-forge/shared-schema";
import { filenameForArchive } from "./naming";

/** Everything one archive needs, as produced by a single render. */
export type SkinBundle = {
  ident: string;
  baseId: string;
  filenames: SpriteFilenames;
  svgs: {
    base: string;
    hands: string;
    feet: string;
    backpack: string;
    loot: string;
    lootInner: string;
    lootOuter: string;
    front: string | null;
  };
  lootBorderOn: boolean;
  configBlock: string;
  manifest: string;
  /** Standalone preview page; `null` leaves it out of the archive. */
  previewDocument: string | null;
};

export type ArchiveOptions = {
  spritesOnly: boolean;
  exportDir: string;
};

export function archiveName(baseId: string, spritesOnly: boolean): string {
  return spritesOnly ? `${baseId}_sprites.zip` : `${baseId}_skin.zip`;
}

/** Zip entry names in write order. */
export function archiveEntries(bundle: SkinBundle, options: ArchiveOptions): Array<[name: string, content: string]> {
  const { filenames, svgs } = bundle;
  const entries: Array<[string, string]> = [
    [filenameForArchive(filenames.base), svgs.base],
    [filenameForArchive(filenames.hands), svgs.hands],
    [filenameForArchive(filenames.feet), svgs.feet],
    [filenameForArchive(filenames.backpack), svgs.backpack],
    [filenameForArchive(filenames.loot), svgs.loot],
  ];
  if (bundle.lootBorderOn && filenames.border) {
    entries.push([filenameForArchive(filenames.border), svgs.lootOuter]);
  }
  if (bundle.lootBorderOn && filenames.inner) {
    entries.push([filenameForArchive(filenames.inner), svgs.lootInner]);
  }
  if (filenames.front && svgs.front !== null) {
    entries.push([filenameForArchive(filenames.front), svgs.front]);
  }
  if (!options.spritesOnly) {
    const dir = options.exportDir.replace(/\/+$/, "") || "export";
    entries.push([`${dir}/${bundle.ident}.ts`, bundle.configBlock]);
    entries.push([`${dir}/${bundle.ident}.manifest.json`, bundle.manifest]);
    if (bundle.previewDocument !== null) {
      entries.push([`${dir}/${bundle.ident}.preview.html`, bundle.previewDocument]);
    }
  }
  return entries;
}

export async function buildSkinArchive(bundle: SkinBundle, options: ArchiveOptions): Promise<Buffer> {
  const zip = new JSZip();
  for (const [name, content] of archiveEntries(bundle, options)) {
    zip.file(name, content);
  }
  return zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
}
