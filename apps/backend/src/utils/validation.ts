import type { z } from "zod";

/** First zod issue as `path: message`. */
export function formatZodError(error: z.ZodError, fallbackPath = "body"): string {
  const first = error.issues[0];
  if (!first) return "invalid payload";
  const path = first.path.length > 0 ? first.path.join(".") : fallbackPath;
  return `${path}: ${first.message}`;
}
