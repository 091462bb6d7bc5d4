import type { z } from "zod";

export interface RequestOptions {
  signal?: AbortSignal;
  headers?: Record<string, string>;
  /** Treat these statuses as "no results" instead of failing. */
  emptyOn?: number[];
}

export class HttpStatusError extends Error {
  readonly status: number;

  constructor(url: string, status: number, statusText: string) {
    super(`${status} ${statusText} for ${url}`);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

export function withQuery(base: string, params: Record<string, string | number | undefined>): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

async function send(url: string, options: RequestOptions, accept: string): Promise<Response | null> {
  const response = await fetch(url, {
    signal: options.signal,
    headers: { accept, ...(options.headers ?? {}) },
  });

  if (options.emptyOn?.includes(response.status)) {
    return null;
  }
  if (!response.ok) {
    throw new HttpStatusError(url, response.status, response.statusText);
  }
  return response;
}

export async function fetchJson<S extends z.ZodTypeAny>(
  url: string,
  schema: S,
  options: RequestOptions = {},
): Promise<z.output<S> | null> {
  const response = await send(url, options, "application/json");
  if (!response) {
    return null;
  }
  return schema.parse(await response.json());
}

export async function fetchText(url: string, options: RequestOptions = {}): Promise<string> {
  const response = await send(url, options, "text/plain, application/xml;q=0.9, */*;q=0.8");
  return response ? await response.text() : "";
}
