/**
 * Cookie-aware HTTP requests against the panel
 *
 * Redirects are followed by hand so Set-Cookie headers are captured on every
 * hop (the login POST answers 302 + session cookie). Failures are classified
 * into FetchError kinds here so callers never see a raw fetch error.
 */

import { SCRAPER_CONFIG } from "@/config/constants";
import { ErrorContext, FetchError } from "@/core/errors";
import type { CookieJar } from "@/auth/CookieJar";

const MAX_REDIRECTS = 10;

/** Statuses worth retrying */
export const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([408, 429]);

export interface HttpRequest {
  url: string;
  method?: "GET" | "POST";
  form?: Record<string, string>;
  cookies: CookieJar;
  timeoutMs: number;
  referer?: string;
}

export interface HttpResponse {
  status: number;
  /** URL of the last hop */
  url: string;
  html: string;
}

export function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUSES.has(status) || status >= 500;
}

/**
 * @throws FetchError - network failure, timeout, malformed URL, redirect loop
 */
export async function sendRequest(
  request: HttpRequest,
  context: ErrorContext = {},
): Promise<HttpResponse> {
  let url = parseUrl(request.url, context);
  let method = request.method ?? "GET";
  let body: URLSearchParams | undefined =
    request.form && method === "POST" ? new URLSearchParams(request.form) : undefined;

  for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
    const response = await send(url, method, body, request, context);
    request.cookies.storeFrom(response.headers);

    const location = response.headers.get("location");
    if (response.status >= 300 && response.status < 400 && location) {
      await response.arrayBuffer();
      url = parseUrl(new URL(location, url).toString(), context);
      // 301/302/303 after a POST continue as GET
      if (response.status !== 307 && response.status !== 308) {
        method = "GET";
        body = undefined;
      }
      continue;
    }

    return {
      status: response.status,
      url: url.toString(),
      html: await readBody(response, { ...context, url: url.toString() }),
    };
  }

  throw FetchError.permanent(`Too many redirects (>${MAX_REDIRECTS})`, {
    ...context,
    url: url.toString(),
  });
}

async function send(
  url: URL,
  method: "GET" | "POST",
  body: URLSearchParams | undefined,
  request: HttpRequest,
  context: ErrorContext,
): Promise<Response> {
  const headers: Record<string, string> = {
    "User-Agent": SCRAPER_CONFIG.DEFAULT_USER_AGENT,
    Accept: "text/html,application/xhtml+xml",
    "Accept-Language": "pt-BR,pt;q=0.9",
  };
  const cookieHeader = request.cookies.toHeader();
  if (cookieHeader) {
    headers.Cookie = cookieHeader;
  }
  if (request.referer) {
    headers.Referer = request.referer;
  }

  try {
    return await fetch(url, {
      method,
      headers,
      body,
      redirect: "manual",
      signal: AbortSignal.timeout(request.timeoutMs),
    });
  } catch (error) {
    throw classifyNetworkError(error, { ...context, url: url.toString() });
  }
}

async function readBody(
  response: Response,
  context: ErrorContext,
): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw classifyNetworkError(error, context);
  }
}

function parseUrl(raw: string, context: ErrorContext): URL {
  try {
    return new URL(raw);
  } catch (error) {
    throw FetchError.permanent(`Malformed URL: ${raw}`, { ...context, url: raw }, error);
  }
}

/**
 * Timeouts and connection failures are transient
 */
export function classifyNetworkError(
  error: unknown,
  context: ErrorContext,
): FetchError {
  if (error instanceof FetchError) {
    return error;
  }
  if (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  ) {
    return FetchError.transient("Request timeout", context, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return FetchError.transient(`Network error: ${message}`, context, error);
}
