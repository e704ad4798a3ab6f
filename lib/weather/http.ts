import type { Logger } from "pino";

import { childLogger, redactUrl, startTimer, toErrorObject } from "../logging";

export type QueryParams = Record<string, string | number>;

export type HttpFailure =
  | { type: "network"; message: string }
  | { type: "status"; status: number; statusText: string; body: string }
  | { type: "parse"; status: number; message: string };

export type HttpResult = { ok: true; status: number; data: unknown } | { ok: false; failure: HttpFailure };

export type HttpOptions = {
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  signal?: AbortSignal;
  log?: Logger;
};

export function buildUrl(baseUrl: string, params: QueryParams): URL {
  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, String(value));
  }
  return url;
}

function transportReason(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause: unknown = err.cause;
  if (cause instanceof Error && cause.message && cause.message !== err.message) {
    return `${err.message} (${cause.message})`;
  }
  return err.message;
}

/**
 * GET a URL and parse the body as JSON. Transport problems, non-2xx statuses
 * and unparseable bodies come back as a tagged failure; nothing throws.
 */
export async function getJson(baseUrl: string, params: QueryParams, options: HttpOptions): Promise<HttpResult> {
  const { timeoutMs, signal } = options;
  const fetchImpl = options.fetchImpl ?? globalThis.fetch;
  const url = buildUrl(baseUrl, params);
  const log = childLogger({ component: "http" }, options.log);
  const timer = startTimer();

  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onCancel = () => controller.abort();
  if (signal?.aborted) controller.abort();
  signal?.addEventListener("abort", onCancel, { once: true });

  // Aborts during the body read are transport failures too.
  const abortReason = (): string | undefined => {
    if (timedOut) return `request timed out after ${timeoutMs}ms`;
    if (signal?.aborted) return "request cancelled";
    return undefined;
  };
  const networkFailure = (reason: string, err: unknown): HttpResult => {
    log.warn({ event: "http.request.error", url: redactUrl(url), durationMs: timer(), err: toErrorObject(err) });
    return { ok: false, failure: { type: "network", message: `Network error: ${reason}` } };
  };

  log.debug({ event: "http.request.start", url: redactUrl(url) });

  try {
    let res: Response;
    try {
      res = await fetchImpl(url, { signal: controller.signal, headers: { Accept: "application/json" } });
    } catch (err) {
      return networkFailure(abortReason() ?? transportReason(err), err);
    }

    if (!res.ok) {
      let body = "";
      try {
        body = await res.text();
      } catch (err) {
        const reason = abortReason();
        if (reason) return networkFailure(reason, err);
      }
      log.warn({ event: "http.request.status", url: redactUrl(url), status: res.status, durationMs: timer() });
      return { ok: false, failure: { type: "status", status: res.status, statusText: res.statusText, body } };
    }

    try {
      const data: unknown = await res.json();
      log.debug({ event: "http.request.success", url: redactUrl(url), status: res.status, durationMs: timer() });
      return { ok: true, status: res.status, data };
    } catch (err) {
      const reason = abortReason();
      if (reason) return networkFailure(reason, err);
      log.warn({ event: "http.request.parse_error", url: redactUrl(url), status: res.status, durationMs: timer() });
      return {
        ok: false,
        failure: { type: "parse", status: res.status, message: `Failed to parse JSON response: ${String(err)}` }
      };
    }
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onCancel);
  }
}
