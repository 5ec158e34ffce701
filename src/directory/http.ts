/**
 * JSON-over-HTTP helper shared by the directory adapters.
 */

import type { z } from "zod";

export const DEFAULT_TIMEOUT_MS = 10_000;

export interface JsonRequest {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
}

/** Fetch `url`, fail on non-2xx, and validate the JSON body against `schema`. */
export async function requestJson<S extends z.ZodTypeAny>(
  url: string,
  schema: S,
  request: JsonRequest = {},
): Promise<z.infer<S>> {
  const method = request.method ?? "GET";
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), request.timeoutMs ?? DEFAULT_TIMEOUT_MS);

  try {
    const response = await fetch(url, {
      method,
      headers: request.headers,
      body: request.body,
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`${method} ${url} failed: HTTP ${response.status}`);
    }

    const data: unknown = await response.json();
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new Error(`Unexpected response from ${url}: ${result.error.message}`);
    }
    return result.data;
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      throw new Error(`${method} ${url} timed out`);
    }
    throw error;
  } finally {
    clearTimeout(timeout);
  }
}
