/**
 * HTTP/1.1 exchange over a raw TCP/TLS socket.
 * Writes one request, then feeds socket data through the ResponseReader
 * until the response is complete.
 */
import type { Buffer } from "node:buffer";
import type { Duplex } from "node:stream";
import { HttpClientError } from "../errors.js";
import { debug } from "../utils/log.js";
import type { ParsedUrl } from "../utils/url.js";
import { ResponseReader, type BodyFraming } from "./parser.js";
import { serializeRequest, type RequestSpec } from "./request.js";
import type { HeaderList } from "../utils/headers.js";

export interface Http1Request {
  url: ParsedUrl;
  spec: RequestSpec;
  /** Idle timeout while waiting for response bytes (ms) */
  readTimeout?: number;
  /** Timeout for the request bytes to be flushed (ms) */
  writeTimeout?: number;
  /** Cap on decoded body bytes */
  maxResponseSize?: number;
  /** Cap on status line + header block bytes */
  maxHeaderSize?: number;
}

export interface Http1Response {
  httpVersion: string;
  status: number;
  statusText: string;
  headers: HeaderList;
  framing: BodyFraming;
  body: Buffer;
  /** Bytes received from the peer, framing included */
  bytesRead: number;
}

function hasTimeout(ms: number | undefined): ms is number {
  return typeof ms === "number" && ms > 0 && ms < Infinity;
}

/**
 * Send an HTTP/1.1 request over a socket and read the complete response.
 *
 * The socket is destroyed on every failure. On success it is left open:
 * closing it is up to whoever opened it.
 */
export function http1Request(socket: Duplex, request: Http1Request): Promise<Http1Response> {
  const { spec, url } = request;
  const reader = new ResponseReader({
    method: spec.method,
    maxResponseSize: request.maxResponseSize,
    maxHeaderSize: request.maxHeaderSize,
  });

  return new Promise((resolve, reject) => {
    // Invalid method or headers reject here, before anything is written
    const payload = serializeRequest(spec, url);
    let settled = false;
    let readTimer: ReturnType<typeof setTimeout> | null = null;
    const readTimeout = request.readTimeout;

    const cleanup = () => {
      socket.removeListener("data", onData);
      socket.removeListener("end", onEnd);
      socket.removeListener("close", onClose);
      socket.removeListener("error", onError);
      clearReadTimer();
    };

    const finish = (err: unknown) => {
      if (settled) return;
      settled = true;
      cleanup();
      if (err !== null) {
        socket.destroy();
        reject(err);
        return;
      }
      const response = reader.result();
      debug(
        "http1",
        `< ${response.httpVersion} ${response.status} ${response.statusText} (${response.framing.kind}, ${response.body.length} bytes)`,
      );
      resolve({ ...response, bytesRead: reader.bytesRead });
    };

    const clearReadTimer = () => {
      if (readTimer) {
        clearTimeout(readTimer);
        readTimer = null;
      }
    };

    const armReadTimer = () => {
      if (!hasTimeout(readTimeout) || settled) return;
      clearReadTimer();
      readTimer = setTimeout(() => {
        readTimer = null;
        finish(
          new HttpClientError("ReadTimeout", `No response data for ${readTimeout}ms`, {
            stage: reader.stage,
            bytesRead: reader.bytesRead,
          }),
        );
      }, readTimeout);
    };

    const onData = (chunk: Buffer | Uint8Array) => {
      try {
        reader.feed(chunk);
      } catch (err) {
        finish(err);
        return;
      }
      if (reader.done) {
        finish(null);
      } else {
        armReadTimer();
      }
    };

    const onEnd = () => {
      try {
        reader.end();
      } catch (err) {
        finish(err);
        return;
      }
      finish(null);
    };

    // A close without "end" (peer reset after a clean FIN is not reported otherwise)
    const onClose = () => {
      if (!settled) onEnd();
    };

    // Socket errors are reported as-is
    const onError = (err: Error) => finish(err);

    socket.on("data", onData);
    socket.on("end", onEnd);
    socket.on("close", onClose);
    socket.on("error", onError);

    debug("http1", `> ${spec.method.toUpperCase()} ${url.hostname}:${url.port} (${payload.length} bytes)`);
    writeToSocket(socket, payload, request.writeTimeout).then(
      () => armReadTimer(),
      (err: unknown) => finish(err),
    );
  });
}

function writeToSocket(socket: Duplex, data: Buffer, timeout: number | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    let timer: ReturnType<typeof setTimeout> | null = null;
    if (hasTimeout(timeout)) {
      timer = setTimeout(() => {
        timer = null;
        reject(
          new HttpClientError("WriteTimeout", `Request not sent within ${timeout}ms`, {
            stage: "write",
          }),
        );
      }, timeout);
    }
    socket.write(data, (err?: Error | null) => {
      if (timer) clearTimeout(timer);
      if (err) reject(err);
      else resolve();
    });
  });
}
