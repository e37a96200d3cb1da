import type { RequestBody } from "../types/http.js";
import { SDK_VERSION } from "./constants.js";

/**
 * Build the headers sent with every attempt.
 *
 * Content-Type is only set for JSON bodies; for multipart bodies axios
 * writes it together with the form boundary.
 */
export function buildHeaders(
  apiKey: string,
  body?: RequestBody,
  extra: Readonly<Record<string, string>> = {},
): Record<string, string> {
  const headers: Record<string, string> = {
    Authorization: `Bearer ${apiKey}`,
    "User-Agent": `docuflow-sdk-js/${SDK_VERSION}`,
    Accept: "application/json",
  };
  if (body?.type === "json") {
    headers["Content-Type"] = "application/json";
  }
  return { ...headers, ...extra };
}

/**
 * Flatten response headers into a plain object with lower-cased names
 */
export function normalizeHeaders(headers: unknown): Record<string, string> {
  const normalized: Record<string, string> = {};
  if (typeof headers !== "object" || headers === null) {
    return normalized;
  }
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    normalized[key.toLowerCase()] = Array.isArray(value)
      ? value.join(", ")
      : String(value);
  }
  return normalized;
}

/**
 * Mask an API key for safe display, keeping the first five characters
 */
export function maskApiKey(apiKey: string): string {
  return apiKey.length <= 5 ? "***" : `${apiKey.slice(0, 5)}***`;
}
