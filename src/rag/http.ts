import type { z } from "zod";
import { ServiceError, ServiceTimeoutError, type ServiceName } from "./errors.js";

export interface RequestOptions {
  service: ServiceName;
  timeoutMs: number;
  apiKey?: string;
}

function toServiceError(err: unknown, options: RequestOptions): ServiceError {
  if (err instanceof ServiceError) return err;
  if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
    return new ServiceTimeoutError(options.service, options.timeoutMs, err);
  }
  return new ServiceError(
    options.service,
    `${options.service} request failed: ${err instanceof Error ? err.message : String(err)}`,
    { cause: err },
  );
}

/**
 * fetch with a timeout. An aborted call becomes `ServiceTimeoutError`, any other
 * transport failure a `ServiceError`. HTTP error statuses are left to the caller.
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  options: RequestOptions,
): Promise<Response> {
  try {
    return await fetch(url, { ...init, signal: AbortSignal.timeout(options.timeoutMs) });
  } catch (err) {
    throw toServiceError(err, options);
  }
}

/**
 * Reads a response body. The request's timeout signal still runs while the body
 * streams, so failures here map to the same error kinds as the request.
 */
export async function readBody<T>(read: () => Promise<T>, options: RequestOptions): Promise<T> {
  try {
    return await read();
  } catch (err) {
    throw toServiceError(err, options);
  }
}

export async function ensureOk(res: Response, options: RequestOptions): Promise<Response> {
  if (!res.ok) {
    const text = await readBody(() => res.text(), options);
    throw new ServiceError(options.service, `${options.service} API error (${res.status}): ${text}`, {
      status: res.status,
    });
  }
  return res;
}

/** POSTs JSON and validates the JSON response against `schema`. */
export async function postJson<S extends z.ZodTypeAny>(
  url: string,
  body: unknown,
  schema: S,
  options: RequestOptions,
): Promise<z.output<S>> {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (options.apiKey) headers["Authorization"] = `Bearer ${options.apiKey}`;

  const res = await fetchWithTimeout(
    url,
    { method: "POST", headers, body: JSON.stringify(body) },
    options,
  );
  await ensureOk(res, options);
  const json = await readBody<unknown>(() => res.json(), options);
  return parseResponse(json, schema, options.service);
}

export function parseResponse<S extends z.ZodTypeAny>(
  json: unknown,
  schema: S,
  service: ServiceName,
): z.output<S> {
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new ServiceError(
      service,
      `${service} API returned an unexpected response: ${parsed.error.issues[0]?.message ?? "invalid"}`,
    );
  }
  return parsed.data;
}
