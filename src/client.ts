/**
 * HTTP/1.1 client entry point.
 * One connection per attempt; redirects are followed hop by hop, each on a fresh socket.
 */
import { Buffer } from "node:buffer";
import { DEFAULTS, type TlsVersion } from "./config.js";
import { http1Request, type Http1Response } from "./http1/client.js";
import type { BodyFraming } from "./http1/parser.js";
import { isRedirectStatus, nextHop, type Hop } from "./redirect.js";
import { createConnection } from "./socket/tls.js";
import { HeaderList, validateMethod, type HeadersInit } from "./utils/headers.js";
import { formatUrl, parseUrl } from "./utils/url.js";

export interface RequestOptions {
  method?: string;
  headers?: HeadersInit;
  body?: Uint8Array | string | null;
  /** "user:pass" for Basic authentication (wins over userinfo in the URL) */
  credentials?: string;
  /** Redirect handling: 'follow' or 'manual' (default) */
  redirect?: "follow" | "manual";
  /** Maximum number of redirects to follow (default: 10) */
  maxRedirects?: number;
  /** TCP connect + TLS handshake timeout in ms (default: 10000) */
  connectTimeout?: number;
  /** Idle timeout waiting for response data in ms (default: 30000) */
  readTimeout?: number;
  /** Timeout for sending the request in ms (default: 10000) */
  writeTimeout?: number;
  /** Lowest accepted TLS version for https (default: "1.2") */
  minTlsVersion?: TlsVersion;
  /** Cap on decoded body bytes (default: 10 MiB) */
  maxResponseSize?: number;
}

export interface HttpResponse {
  /** URL of the final hop */
  url: string;
  httpVersion: string;
  status: number;
  statusText: string;
  headers: HeaderList;
  framing: BodyFraming;
  body: Buffer;
  /** Number of redirects followed */
  redirects: number;

  /** Body decoded as UTF-8 */
  text(): string;
}

type ExchangeSettings = Required<
  Pick<
    RequestOptions,
    "connectTimeout" | "readTimeout" | "writeTimeout" | "minTlsVersion" | "maxResponseSize"
  >
>;

/**
 * Send an HTTP request and read the whole response.
 * A bad URL, method or header rejects with InvalidUrl or InvalidRequest before connecting.
 *
 * @example
 * ```ts
 * const response = await request('https://example.com/api', {
 *   method: 'POST',
 *   headers: { 'Content-Type': 'application/json' },
 *   body: JSON.stringify({ name: 'test' }),
 *   redirect: 'follow',
 * });
 * console.log(response.status, response.text());
 * ```
 */
export async function request(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
  const settings: ExchangeSettings = {
    connectTimeout: options.connectTimeout ?? DEFAULTS.connectTimeout,
    readTimeout: options.readTimeout ?? DEFAULTS.readTimeout,
    writeTimeout: options.writeTimeout ?? DEFAULTS.writeTimeout,
    minTlsVersion: options.minTlsVersion ?? DEFAULTS.minTlsVersion,
    maxResponseSize: options.maxResponseSize ?? DEFAULTS.maxResponseSize,
  };
  const follow = options.redirect === "follow";
  let remaining = options.maxRedirects ?? DEFAULTS.maxRedirects;

  const target = parseUrl(url);
  const method = (options.method ?? "GET").toUpperCase();
  validateMethod(method);
  let hop: Hop = {
    url: target,
    method,
    headers: new HeaderList(options.headers),
    body: normalizeBody(options.body),
    credentials: options.credentials ?? target.credentials,
  };
  let redirects = 0;

  while (true) {
    const response = await exchange(hop, settings);
    if (!follow || !isRedirectStatus(response.status)) {
      return wrapResponse(formatUrl(hop.url), response, redirects);
    }
    hop = nextHop(hop, response, remaining);
    remaining--;
    redirects++;
  }
}

/**
 * One attempt: open a connection, run the exchange, close the connection
 * whatever the outcome.
 */
async function exchange(hop: Hop, settings: ExchangeSettings): Promise<Http1Response> {
  const connection = await createConnection(hop.url, {
    connectTimeout: settings.connectTimeout,
    minTlsVersion: settings.minTlsVersion,
  });
  try {
    return await http1Request(connection.socket, {
      url: hop.url,
      spec: {
        method: hop.method,
        headers: hop.headers,
        body: hop.body,
        credentials: hop.credentials,
      },
      readTimeout: settings.readTimeout,
      writeTimeout: settings.writeTimeout,
      maxResponseSize: settings.maxResponseSize,
    });
  } finally {
    connection.close();
  }
}

function normalizeBody(body: Uint8Array | string | null | undefined): Uint8Array | null {
  if (body === null || body === undefined) return null;
  if (typeof body === "string") return Buffer.from(body, "utf-8");
  return body;
}

function wrapResponse(url: string, response: Http1Response, redirects: number): HttpResponse {
  const { body } = response;
  return {
    url,
    httpVersion: response.httpVersion,
    status: response.status,
    statusText: response.statusText,
    headers: response.headers,
    framing: response.framing,
    body,
    redirects,
    text: () => body.toString("utf-8"),
  };
}
