import { getBackendOrigin } from "./constants";

function jsonMessage(text: string): string | null {
  try {
    const json: unknown = JSON.parse(text);
    if (typeof json === "object" && json !== null && "message" in json && typeof json.message === "string") {
      return json.message || null;
    }
    return null;
  } catch {
    return null;
  }
}

async function errorMessage(res: Response): Promise<string> {
  const text = await res.text().catch(() => "");
  return jsonMessage(text) ?? (text || `HTTP ${res.status}`);
}

/**
 * Fetch wrapper. Prepends the backend origin and throws on non-ok responses,
 * using the server's `{ message }` when it sent one.
 */
export async function apiFetch(path: string, init?: RequestInit): Promise<Response> {
  const res = await fetch(`${getBackendOrigin()}${path}`, init);
  if (!res.ok) {
    throw new Error(await errorMessage(res));
  }
  return res;
}

async function readJson<T>(res: Response, path: string): Promise<T> {
  const contentType = res.headers.get("content-type") ?? "";
  if (!contentType.includes("application/json")) {
    const text = await res.text().catch(() => "");
    if (text.toLowerCase().includes("<!doctype")) {
      throw new Error(
        `API returned HTML instead of JSON for ${path}. Check backend URL/proxy configuration.`
      );
    }
    throw new Error(`API returned non-JSON response for ${path} (content-type: ${contentType || "unknown"})`);
  }
  return res.json() as Promise<T>;
}

export async function apiGet<T>(path: string): Promise<T> {
  return readJson<T>(await apiFetch(path), path);
}

export async function apiPost<T>(path: string, body: unknown): Promise<T> {
  const res = await apiFetch(path, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
  return readJson<T>(res, path);
}

export type Download = { blob: Blob; filename: string };

function filenameFromDisposition(header: string | null, fallback: string): string {
  const match = header ? /filename="([^"]+)"/.exec(header) : null;
  return match?.[1] ?? fallback;
}

/** POST JSON and receive a file attachment. */
export async function apiPostDownload(path: string, body: unknown, fallbackName: string): Promise<Download> {
  const res = await apiFetch(path, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
  const blob = await res.blob();
  return { blob, filename: filenameFromDisposition(res.headers.get("content-disposition"), fallbackName) };
}
