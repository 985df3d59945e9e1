/**
 * HTTP/1.1 request serializer.
 * Produces the exact bytes written to the socket for one exchange.
 */
import { Buffer } from "node:buffer";
import { DEFAULTS } from "../config.js";
import { HeaderList, validateMethod } from "../utils/headers.js";
import { hostHeader, requestTarget, type ParsedUrl } from "../utils/url.js";

export interface RequestSpec {
  method: string;
  headers: HeaderList;
  body: Uint8Array | null;
  /** "user:pass" for Basic authentication */
  credentials?: string;
}

/** Headers whose value is always computed here; user-supplied copies are not sent */
const FIXED_HEADERS = new Set(["connection", "content-length"]);

export function basicAuthorization(credentials: string): string {
  return `Basic ${Buffer.from(credentials, "utf-8").toString("base64")}`;
}

/**
 * Serialize request line, headers and body.
 *
 * A body given with HEAD is dropped without complaint: HEAD never carries one.
 */
export function serializeRequest(spec: RequestSpec, url: ParsedUrl): Buffer {
  const method = spec.method.toUpperCase();
  validateMethod(method);

  const body = method === "HEAD" ? null : spec.body;
  const user = spec.headers;

  const head = new HeaderList();
  if (!user.has("host")) head.append("Host", hostHeader(url));
  if (!user.has("user-agent")) head.append("User-Agent", DEFAULTS.userAgent);
  head.append("Connection", "close");
  if (body) head.append("Content-Length", String(body.byteLength));
  if (spec.credentials !== undefined && !user.has("authorization")) {
    head.append("Authorization", basicAuthorization(spec.credentials));
  }
  for (const [name, value] of user) {
    if (FIXED_HEADERS.has(name.toLowerCase())) continue;
    head.append(name, value);
  }

  const requestLine = `${method} ${requestTarget(url)} HTTP/1.1\r\n`;
  const headBytes = Buffer.from(`${requestLine}${head.serialize()}\r\n`, "utf-8");
  return body && body.byteLength > 0 ? Buffer.concat([headBytes, body]) : headBytes;
}
