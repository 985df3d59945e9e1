/**
 * URL parsing utility.
 * Splits an absolute http(s) URL without normalizing it: path and query are
 * sent on the request line exactly as written.
 */
import { HttpClientError } from "../errors.js";

export type Protocol = "https" | "http";

export interface ParsedUrl {
  readonly protocol: Protocol;
  readonly hostname: string; // IPv6 literals keep their brackets, e.g. "[::1]"
  readonly port: number;
  readonly path: string;
  /** Text after "?", without the "?" itself */
  readonly query?: string;
  /** "user:pass" taken from the authority's userinfo */
  readonly credentials?: string;
}

const DEFAULT_PORTS: Record<Protocol, number> = { http: 80, https: 443 };
const SCHEME_RE = /^(https?):\/\//i;
// RFC 7230 3.1.1 request-target cannot contain whitespace or control characters
const INVALID_TARGET_RE = /[\s\0-\x1f\x7f]/;

function invalid(message: string): HttpClientError {
  return new HttpClientError("InvalidUrl", message, { stage: "resolve" });
}

/**
 * Parse a URL string into its components.
 * Throws InvalidUrl for anything other than an absolute http:// or https:// URL.
 */
export function parseUrl(url: string): ParsedUrl {
  const scheme = SCHEME_RE.exec(url);
  if (!scheme) {
    throw invalid(`URL must start with http:// or https://: ${JSON.stringify(url)}`);
  }
  const protocol: Protocol = scheme[1].toLowerCase() === "https" ? "https" : "http";

  let rest = url.substring(scheme[0].length);
  const hashIdx = rest.indexOf("#");
  if (hashIdx !== -1) rest = rest.substring(0, hashIdx);

  const authorityEnd = rest.search(/[/?]/);
  let authority = authorityEnd === -1 ? rest : rest.substring(0, authorityEnd);
  const target = authorityEnd === -1 ? "" : rest.substring(authorityEnd);

  let credentials: string | undefined;
  const atIdx = authority.lastIndexOf("@");
  if (atIdx !== -1) {
    credentials = authority.substring(0, atIdx);
    authority = authority.substring(atIdx + 1);
  }

  const { hostname, port } = splitHostPort(authority, protocol);

  const queryIdx = target.indexOf("?");
  const rawPath = queryIdx === -1 ? target : target.substring(0, queryIdx);
  const query = queryIdx === -1 ? undefined : target.substring(queryIdx + 1);
  const path = rawPath || "/";

  if (INVALID_TARGET_RE.test(path) || (query !== undefined && INVALID_TARGET_RE.test(query))) {
    throw invalid(`Invalid path: ${JSON.stringify(target)} contains whitespace or control characters`);
  }

  const parsed: ParsedUrl = { protocol, hostname, port, path, query, credentials };
  return Object.freeze(parsed);
}

function splitHostPort(authority: string, protocol: Protocol): { hostname: string; port: number } {
  let hostname: string;
  let portStr: string | undefined;

  if (authority.startsWith("[")) {
    const close = authority.indexOf("]");
    if (close === -1) throw invalid(`Invalid IPv6 host: ${JSON.stringify(authority)}`);
    hostname = authority.substring(0, close + 1);
    const after = authority.substring(close + 1);
    if (after.length > 0) {
      if (!after.startsWith(":")) throw invalid(`Invalid host: ${JSON.stringify(authority)}`);
      portStr = after.substring(1);
    }
  } else {
    const colon = authority.indexOf(":");
    hostname = colon === -1 ? authority : authority.substring(0, colon);
    portStr = colon === -1 ? undefined : authority.substring(colon + 1);
  }

  if (hostname.length === 0 || hostname === "[]") {
    throw invalid("Invalid host: host is empty");
  }
  if (INVALID_TARGET_RE.test(hostname)) {
    throw invalid(`Invalid host: ${JSON.stringify(hostname)}`);
  }

  if (portStr === undefined) {
    return { hostname, port: DEFAULT_PORTS[protocol] };
  }
  if (!/^\d{1,5}$/.test(portStr)) {
    throw invalid(`Invalid port: ${JSON.stringify(portStr)}`);
  }
  const port = parseInt(portStr, 10);
  if (port < 1 || port > 65535) {
    throw invalid(`Invalid port: ${port} is outside 1-65535`);
  }
  return { hostname, port };
}

/** Request-target for the request line: path plus "?query" when present */
export function requestTarget(url: ParsedUrl): string {
  return url.query === undefined ? url.path : `${url.path}?${url.query}`;
}

/** Host header value: host, with ":port" only when the port is not the scheme default */
export function hostHeader(url: ParsedUrl): string {
  return url.port === DEFAULT_PORTS[url.protocol] ? url.hostname : `${url.hostname}:${url.port}`;
}

/** Hostname as the socket layer wants it (IPv6 brackets removed) */
export function connectHost(url: ParsedUrl): string {
  return url.hostname.startsWith("[") ? url.hostname.slice(1, -1) : url.hostname;
}

/** Serialize back to an absolute URL (userinfo is never included) */
export function formatUrl(url: ParsedUrl): string {
  return `${url.protocol}://${hostHeader(url)}${requestTarget(url)}`;
}

export function isSameOrigin(a: ParsedUrl, b: ParsedUrl): boolean {
  return (
    a.protocol === b.protocol &&
    a.hostname.toLowerCase() === b.hostname.toLowerCase() &&
    a.port === b.port
  );
}

/**
 * Resolve a Location value against the URL it was received from.
 * Scheme, host and port that the reference leaves out are inherited from `base`.
 * Relative and absolute values get the same percent-encoding.
 */
export function resolveRedirectUrl(base: ParsedUrl, location: string): ParsedUrl {
  let resolved: string;
  try {
    resolved = new URL(location, formatUrl(base)).href;
  } catch (err) {
    throw new HttpClientError("InvalidUrl", `Invalid redirect target: ${JSON.stringify(location)}`, {
      stage: "redirect",
      cause: err,
    });
  }
  return parseUrl(resolved);
}
