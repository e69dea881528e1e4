/** localStorage key for UI preferences (language). */
export const UI_SETTINGS_STORAGE_KEY = "outfit-forge.ui.settings.v1";

/** Delay between the last edit and the render request it triggers. */
export const RENDER_DEBOUNCE_MS = 150;

/** Upload size cap; matches the backend body limit with headroom for base64. */
export const MAX_UPLOAD_BYTES = 4 * 1024 * 1024;

function resolveApiBaseOrThrow(): string {
  const fromEnv = import.meta.env.VITE_API_BASE_URL as string | undefined;
  if (typeof fromEnv === "string" && fromEnv.trim().length > 0) {
    return fromEnv.replace(/\/+$/, "");
  }

  if (typeof window !== "undefined" && window.location?.origin) {
    return window.location.origin;
  }

  throw new Error("api base URL is not configured");
}

export function getBackendOrigin(): string {
  return resolveApiBaseOrThrow();
}
