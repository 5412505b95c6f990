import type { z } from "zod";

type FetchOptions = Parameters<typeof fetch>[1];

export async function fetchWithTimeout(url: string, opts: FetchOptions & { timeoutMs?: number } = {}) {
  const { timeoutMs = 10_000, signal, ...rest } = opts;

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new Error("timeout")), timeoutMs);

  try {
    return await fetch(url, { ...rest, signal: signal ?? controller.signal });
  } finally {
    clearTimeout(timeout);
  }
}

/** GET a JSON document and validate it; `service` names the upstream in errors. */
export async function fetchJson<T extends z.ZodTypeAny>(
  url: URL | string,
  schema: T,
  opts: { timeoutMs: number; service: string }
): Promise<z.infer<T>> {
  const resp = await fetchWithTimeout(url.toString(), { timeoutMs: opts.timeoutMs });
  if (!resp.ok) throw new Error(`${opts.service} error: ${resp.status} ${resp.statusText}`);
  const json: unknown = await resp.json();
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`${opts.service} response failed validation: ${parsed.error.message}`);
  }
  return parsed.data;
}
