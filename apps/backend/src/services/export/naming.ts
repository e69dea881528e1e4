const NON_ALNUM = /[^A-Za-z0-9]+/g;

/** Strip everything but ASCII letters and digits; an empty result becomes "Custom". */
export function sanitize(name: string): string {
  return name.trim().replace(NON_ALNUM, "") || "Custom";
}

function bareExtension(ext: string): string {
  return ext.trim().replace(/^\.+/, "");
}

/**
 * Force `name` to end in `ext` (with or without the leading dot). An existing
 * different extension is replaced. Blank names stay blank.
 */
export function ensureExtension(name: string, ext: string): string {
  const trimmed = name.trim();
  if (!trimmed) return "";
  const suffix = bareExtension(ext);
  if (trimmed.endsWith(`.${suffix}`)) return trimmed;
  const dot = trimmed.lastIndexOf(".");
  const stem = dot > trimmed.lastIndexOf("/") ? trimmed.slice(0, dot) : trimmed;
  return `${stem}.${suffix}`;
}

/** Prepend a directory unless the filename already carries one. */
export function applyPrefix(prefix: string, filename: string): string {
  if (filename.includes("/")) return filename;
  const dir = prefix.trim();
  if (!dir) return filename;
  return dir.endsWith("/") ? `${dir}${filename}` : `${dir}/${filename}`;
}

/** Generated art is always vector, whatever extension the config references. */
export function filenameForArchive(filename: string): string {
  return ensureExtension(filename, ".svg");
}

/** Filename without its directory, as the config block references it. */
export function bareFilename(filename: string): string {
  return filename.slice(filename.lastIndexOf("/") + 1);
}

export type SkinIdentifiers = {
  /** TypeScript identifier of the exported skin definition. */
  ident: string;
  /** Lowercase id used in generated filenames and archive names. */
  baseId: string;
};

export function skinIdentifiers(skinName: string): SkinIdentifiers {
  const safe = sanitize(skinName);
  return { ident: `outfit${safe}`, baseId: safe.toLowerCase() };
}
