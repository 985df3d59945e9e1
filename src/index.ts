/**
 * wirecurl: minimal HTTP/1.1 client over raw TCP/TLS sockets.
 */

// Main API
export { request } from "./client.js";
export type { RequestOptions, HttpResponse } from "./client.js";
export { HttpClientError, isHttpClientError } from "./errors.js";
export type { HttpErrorCode, ExchangeStage } from "./errors.js";
export { DEFAULTS, TLS_VERSIONS } from "./config.js";
export type { TlsVersion } from "./config.js";

// HTTP/1.1 building blocks (advanced usage)
export { http1Request } from "./http1/client.js";
export type { Http1Request, Http1Response } from "./http1/client.js";
export { serializeRequest } from "./http1/request.js";
export type { RequestSpec } from "./http1/request.js";
export { ResponseReader, selectFraming } from "./http1/parser.js";
export type { BodyFraming, ParsedResponse, ResponseStatus } from "./http1/parser.js";
export { ChunkedDecoder } from "./http1/chunked.js";
export { nextHop, isRedirectStatus, redirectMethod } from "./redirect.js";
export type { Hop } from "./redirect.js";

// Socket layer (advanced usage)
export { createConnection } from "./socket/tls.js";
export type { ConnectOptions } from "./socket/tls.js";
export { Connection } from "./socket/connection.js";

// Protocol utilities
export { HeaderList } from "./utils/headers.js";
export type { HeadersInit, HeaderEntry } from "./utils/headers.js";
export { parseUrl, resolveRedirectUrl, requestTarget } from "./utils/url.js";
export type { ParsedUrl } from "./utils/url.js";
export { setLogSink } from "./utils/log.js";
export type { LogSink } from "./utils/log.js";
