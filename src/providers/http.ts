/**
 * HTTP plumbing shared by the data providers
 *
 * Plain fetch with a per-request timeout. Non-2xx responses and timeouts
 * surface as ProviderError; tools turn those into failure payloads.
 */

import { isRecord } from "../data.js";

export type ProviderErrorCode =
  | "timeout"
  | "http_error"
  | "rate_limited"
  | "unauthorized"
  | "network"
  | "missing_key"
  | "bad_response";

export class ProviderError extends Error {
  readonly provider: string;
  readonly code: ProviderErrorCode;
  readonly status?: number;

  constructor(provider: string, code: ProviderErrorCode, message: string, status?: number) {
    super(message);
    this.name = "ProviderError";
    this.provider = provider;
    this.code = code;
    this.status = status;
  }
}

export interface RequestOptions {
  headers?: Record<string, string>;
  params?: Record<string, string | number | undefined>;
  timeoutMs?: number;
}

export const USER_AGENT = "MadridistaAI/0.1 (football Q&A bot)";

export function buildUrl(
  base: string,
  params?: Record<string, string | number | undefined>
): string {
  const url = new URL(base);
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      if (value === undefined || value === "") continue;
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

function classifyStatus(status: number): ProviderErrorCode {
  if (status === 429) return "rate_limited";
  if (status === 401 || status === 403) return "unauthorized";
  return "http_error";
}

async function send(
  provider: string,
  url: string,
  accept: string,
  options: RequestOptions
): Promise<Response | null> {
  const target = buildUrl(url, options.params);
  let res: Response;
  try {
    res = await fetch(target, {
      headers: { "User-Agent": USER_AGENT, Accept: accept, ...options.headers },
      signal: AbortSignal.timeout(options.timeoutMs ?? 15_000),
    });
  } catch (err: unknown) {
    const name = err instanceof Error ? err.name : "";
    if (name === "TimeoutError" || name === "AbortError") {
      throw new ProviderError(provider, "timeout", `${provider} timed out`);
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new ProviderError(provider, "network", `${provider} unreachable: ${message}`);
  }

  if (res.status === 404) return null;
  if (!res.ok) {
    throw new ProviderError(
      provider,
      classifyStatus(res.status),
      `${provider} responded ${res.status}`,
      res.status
    );
  }
  return res;
}

/**
 * GET a JSON document. Resolves to `null` on 404 so "not found" stays a
 * normal outcome for callers; every other failure throws ProviderError.
 */
export async function getJson(
  provider: string,
  url: string,
  options: RequestOptions = {}
): Promise<unknown> {
  const res = await send(provider, url, "application/json", options);
  if (!res) return null;
  try {
    return await res.json();
  } catch {
    throw new ProviderError(provider, "bad_response", `${provider} returned invalid JSON`);
  }
}

/** GET a plain-text body (CSV feeds); `null` on 404 like getJson */
export async function getText(
  provider: string,
  url: string,
  options: RequestOptions = {}
): Promise<string | null> {
  const res = await send(provider, url, "text/csv, text/plain", options);
  return res ? res.text() : null;
}

export function requireKey(provider: string, key: string | undefined): string {
  if (!key) {
    throw new ProviderError(provider, "missing_key", `${provider} API key is not configured`);
  }
  return key;
}

// ---------------------------------------------------------------------------
// Narrowing helpers for loosely-typed provider JSON
// ---------------------------------------------------------------------------

export function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function asNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/** Follow a key path through nested objects: pick(obj, "teams", "home", "name") */
export function pick(value: unknown, ...path: string[]): unknown {
  let current: unknown = value;
  for (const key of path) {
    current = asRecord(current)[key];
  }
  return current;
}
