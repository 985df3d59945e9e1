/**
 * Redirect handling: decides the next hop for a 3xx response.
 */
import { HttpClientError } from "./errors.js";
import { HeaderList } from "./utils/headers.js";
import { debug } from "./utils/log.js";
import { formatUrl, isSameOrigin, resolveRedirectUrl, type ParsedUrl } from "./utils/url.js";

/** Everything needed to send one request attempt */
export interface Hop {
  url: ParsedUrl;
  method: string;
  headers: HeaderList;
  body: Uint8Array | null;
  credentials?: string;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/** Request headers that describe the body and go away with it */
const BODY_HEADERS = ["content-type", "content-length", "content-encoding"];

/** Request headers that are not sent to a different origin */
const ORIGIN_BOUND_HEADERS = ["authorization", "cookie", "proxy-authorization", "host"];

export function isRedirectStatus(status: number): boolean {
  return REDIRECT_STATUSES.has(status);
}

/**
 * Method for the next hop (RFC 7231 Section 6.4).
 * 303 always switches to GET (HEAD stays HEAD); 301 and 302 switch a POST to GET;
 * 307 and 308 never change the method. A switched method drops the body.
 */
export function redirectMethod(status: number, method: string): { method: string; dropBody: boolean } {
  const upper = method.toUpperCase();
  if (status === 303 && upper !== "HEAD") {
    return { method: "GET", dropBody: true };
  }
  if ((status === 301 || status === 302) && upper === "POST") {
    return { method: "GET", dropBody: true };
  }
  return { method: upper, dropBody: false };
}

/**
 * Build the next hop from a redirect response.
 * `remaining` is how many more redirects may be followed; at zero this throws TooManyRedirects.
 */
export function nextHop(
  current: Hop,
  response: { status: number; headers: HeaderList },
  remaining: number,
): Hop {
  if (remaining <= 0) {
    throw new HttpClientError(
      "TooManyRedirects",
      `Too many redirects (${response.status} from ${formatUrl(current.url)} after reaching the limit)`,
      { stage: "redirect" },
    );
  }

  const location = response.headers.get("location")?.trim();
  if (!location) {
    throw new HttpClientError(
      "MissingRedirectTarget",
      `${response.status} response from ${formatUrl(current.url)} has no Location header`,
      { stage: "redirect" },
    );
  }

  const url = resolveRedirectUrl(current.url, location);
  const { method, dropBody } = redirectMethod(response.status, current.method);

  const headers = new HeaderList(current.headers);
  if (dropBody) {
    for (const name of BODY_HEADERS) headers.delete(name);
  }

  let credentials = url.credentials;
  if (isSameOrigin(current.url, url)) {
    credentials ??= current.credentials;
  } else {
    for (const name of ORIGIN_BOUND_HEADERS) headers.delete(name);
  }

  debug("redirect", `${response.status} -> ${formatUrl(url)} (${method})`);
  return {
    url,
    method,
    headers,
    body: dropBody ? null : current.body,
    credentials,
  };
}
