/**
 * HTTP/1.1 response parser.
 * State machine that turns raw bytes into a status, a header list and a decoded body:
 *
 *   status-line -> headers -> body -> done
 *
 * with "error" reachable from every state. It knows nothing about sockets:
 * bytes come in through feed(), end-of-stream through end().
 */
import { Buffer } from "node:buffer";
import { DEFAULTS } from "../config.js";
import { HttpClientError, type ExchangeStage } from "../errors.js";
import { HeaderList, isToken } from "../utils/headers.js";
import { ChunkedDecoder } from "./chunked.js";

/** How the end of the body is found; decided once per response */
export type BodyFraming =
  | { kind: "content-length"; length: number }
  | { kind: "chunked" }
  | { kind: "until-close" }
  | { kind: "none" };

export type ReaderState = "status-line" | "headers" | "body" | "done" | "error";

export interface ResponseStatus {
  httpVersion: string;
  status: number;
  statusText: string;
}

export interface ParsedResponse extends ResponseStatus {
  headers: HeaderList;
  framing: BodyFraming;
  body: Buffer;
}

export interface ResponseReaderOptions {
  /** Request method; HEAD responses never have a body */
  method: string;
  /** Cap on decoded body bytes */
  maxResponseSize?: number;
  /** Cap on status line + header block bytes */
  maxHeaderSize?: number;
}

const STATUS_LINE_RE = /^(HTTP\/\d\.\d) (\d{3})(?: (.*))?$/;
const CONTENT_LENGTH_RE = /^\d+$/;
const INVALID_VALUE_CHAR_RE = /[\0\r\n]/;

/**
 * Pick the body framing from status, method and headers (RFC 7230 Section 3.3.3).
 */
export function selectFraming(method: string, status: number, headers: HeaderList): BodyFraming {
  if (method.toUpperCase() === "HEAD" || status < 200 || status === 204 || status === 304) {
    return { kind: "none" };
  }

  // Transfer-Encoding takes precedence over Content-Length
  if (headers.getAll("transfer-encoding").some(v => v.toLowerCase().includes("chunked"))) {
    return { kind: "chunked" };
  }

  const lengths = headers.getAll("content-length");
  if (lengths.length > 0) {
    const values = lengths.flatMap(v => v.split(",")).map(v => v.trim());
    const first = values[0];
    if (!values.every(v => CONTENT_LENGTH_RE.test(v))) {
      throw new HttpClientError("MalformedHeader", `Invalid Content-Length: ${JSON.stringify(lengths.join(", "))}`, {
        stage: "headers",
      });
    }
    if (!values.every(v => v === first)) {
      throw new HttpClientError("MalformedHeader", `Conflicting Content-Length values: ${lengths.join(", ")}`, {
        stage: "headers",
      });
    }
    const length = Number(first);
    if (!Number.isSafeInteger(length)) {
      throw new HttpClientError("MalformedHeader", `Content-Length out of range: ${first}`, {
        stage: "headers",
      });
    }
    return { kind: "content-length", length };
  }

  return { kind: "until-close" };
}

export class ResponseReader {
  private _state: ReaderState = "status-line";
  private readonly method: string;
  private readonly maxResponseSize: number;
  private readonly maxHeaderSize: number;

  private head: Buffer = Buffer.alloc(0);
  private headBytes = 0;
  private _bytesRead = 0;

  private status: ResponseStatus | null = null;
  private headers = new HeaderList();
  private framing: BodyFraming | null = null;
  private chunkedDecoder: ChunkedDecoder | null = null;
  private contentRemaining = 0;
  private bodyChunks: Buffer[] = [];
  private _bodyBytes = 0;

  constructor(options: ResponseReaderOptions) {
    this.method = options.method.toUpperCase();
    this.maxResponseSize = options.maxResponseSize ?? DEFAULTS.maxResponseSize;
    this.maxHeaderSize = options.maxHeaderSize ?? DEFAULTS.maxHeaderSize;
  }

  get state(): ReaderState {
    return this._state;
  }

  get done(): boolean {
    return this._state === "done";
  }

  /** Bytes received from the peer so far (head and body, framing included) */
  get bytesRead(): number {
    return this._bytesRead;
  }

  /** Decoded body bytes so far */
  get bodyBytes(): number {
    return this._bodyBytes;
  }

  /** The exchange stage the reader is in, for error reports */
  get stage(): ExchangeStage {
    switch (this._state) {
      case "status-line":
        return "status-line";
      case "headers":
        return "headers";
      default:
        return "body";
    }
  }

  /**
   * Consume bytes from the peer. Throws HttpClientError on malformed input or when
   * a size cap is crossed; nothing fed after that (or after done) is looked at.
   */
  feed(data: Buffer | Uint8Array): void {
    if (this._state === "done" || this._state === "error") return;
    const buf = Buffer.isBuffer(data) ? data : Buffer.from(data);
    this._bytesRead += buf.length;
    this.guard(() => {
      if (this._state === "status-line" || this._state === "headers") {
        const rest = this.readHead(buf);
        if (rest && rest.length > 0) this.readBody(rest);
      } else {
        this.readBody(buf);
      }
    });
  }

  /** Signal end-of-stream from the peer */
  end(): void {
    if (this._state === "done" || this._state === "error") return;
    this.guard(() => {
      switch (this._state) {
        case "status-line":
          throw new HttpClientError(
            "MalformedStatusLine",
            this._bytesRead === 0
              ? "Connection closed before a response was received"
              : "Connection closed inside the status line",
            { stage: "status-line" },
          );
        case "headers":
          throw new HttpClientError("MalformedHeader", "Connection closed before end of headers", {
            stage: "headers",
          });
        case "body":
          this.endBody();
          break;
      }
    });
  }

  /** The complete response; only available once done */
  result(): ParsedResponse {
    if (this._state !== "done" || !this.status || !this.framing) {
      throw new Error(`Response is not complete (state: ${this._state})`);
    }
    return {
      ...this.status,
      headers: this.headers,
      framing: this.framing,
      body: Buffer.concat(this.bodyChunks, this._bodyBytes),
    };
  }

  private guard(step: () => void): void {
    try {
      step();
    } catch (err) {
      this._state = "error";
      this.head = Buffer.alloc(0);
      this.bodyChunks = [];
      if (err instanceof HttpClientError && err.bytesRead === undefined) {
        throw new HttpClientError(err.code, err.message, {
          stage: err.stage,
          bytesRead: this._bytesRead,
          cause: err.cause,
        });
      }
      throw err;
    }
  }

  /**
   * Process status line and header lines. Returns the bytes that follow the
   * header block once it is complete, or null if more data is needed.
   */
  private readHead(data: Buffer): Buffer | null {
    this.head = this.head.length > 0 ? Buffer.concat([this.head, data]) : data;

    while (this._state === "status-line" || this._state === "headers") {
      const crlfIdx = this.head.indexOf("\r\n");
      if (crlfIdx === -1) {
        this.checkHeadSize(this.headBytes + this.head.length);
        return null;
      }
      this.headBytes += crlfIdx + 2;
      this.checkHeadSize(this.headBytes);

      const line = this.head.subarray(0, crlfIdx).toString("latin1");
      this.head = this.head.subarray(crlfIdx + 2);

      if (this._state === "status-line") {
        this.status = parseStatusLine(line);
        this._state = "headers";
      } else if (line.length > 0) {
        const [name, value] = parseHeaderField(line);
        this.headers.append(name, value);
      } else {
        this.finishHead();
      }
    }

    const rest = this.head;
    this.head = Buffer.alloc(0);
    return rest;
  }

  private checkHeadSize(size: number): void {
    if (size > this.maxHeaderSize) {
      throw new HttpClientError(
        "HeadersTooLarge",
        `Response headers too large (>${this.maxHeaderSize} bytes)`,
        { stage: this._state === "status-line" ? "status-line" : "headers" },
      );
    }
  }

  private finishHead(): void {
    if (!this.status) return;
    const { status } = this.status;

    // Interim 1xx responses (100 Continue, 103 Early Hints) precede the real one
    if (status >= 100 && status < 200 && status !== 101) {
      this.status = null;
      this.headers = new HeaderList();
      this.headBytes = 0;
      this._state = "status-line";
      return;
    }

    const framing = selectFraming(this.method, status, this.headers);
    this.framing = framing;
    this._state = "body";

    switch (framing.kind) {
      case "none":
        this._state = "done";
        break;
      case "content-length":
        if (framing.length > this.maxResponseSize) {
          throw this.tooLarge(`Content-Length ${framing.length} exceeds limit`);
        }
        this.contentRemaining = framing.length;
        if (framing.length === 0) this._state = "done";
        break;
      case "chunked":
        this.chunkedDecoder = new ChunkedDecoder();
        break;
      case "until-close":
        break;
    }
  }

  private readBody(data: Buffer): void {
    if (this._state !== "body" || !this.framing) return;

    switch (this.framing.kind) {
      case "content-length": {
        const take = Math.min(this.contentRemaining, data.length);
        this.pushBody(data.subarray(0, take));
        this.contentRemaining -= take;
        if (this.contentRemaining === 0) this._state = "done";
        break;
      }
      case "chunked": {
        const decoder = this.chunkedDecoder;
        if (!decoder) return;
        decoder.feed(data);
        for (const chunk of decoder.getChunks()) this.pushBody(chunk);
        if (decoder.done) this._state = "done";
        break;
      }
      case "until-close":
        this.pushBody(data);
        break;
      case "none":
        break;
    }
  }

  private pushBody(chunk: Buffer): void {
    if (chunk.length === 0) return;
    if (this._bodyBytes + chunk.length > this.maxResponseSize) {
      throw this.tooLarge(`Response body exceeds ${this.maxResponseSize} bytes`);
    }
    this._bodyBytes += chunk.length;
    this.bodyChunks.push(chunk);
  }

  private endBody(): void {
    const framing = this.framing;
    if (!framing) return;
    switch (framing.kind) {
      case "until-close":
      case "none":
        this._state = "done";
        return;
      case "content-length":
        throw new HttpClientError(
          "TruncatedBody",
          `Connection closed after ${this._bodyBytes} of ${framing.length} body bytes`,
          { stage: "body" },
        );
      case "chunked":
        throw new HttpClientError(
          "TruncatedBody",
          `Connection closed before the terminating chunk (${this._bodyBytes} body bytes decoded)`,
          { stage: "body" },
        );
    }
  }

  private tooLarge(message: string): HttpClientError {
    return new HttpClientError("ResponseTooLarge", `${message} (limit ${this.maxResponseSize})`, {
      stage: "body",
    });
  }
}

/** Parse "HTTP/1.1 200 OK" */
export function parseStatusLine(line: string): ResponseStatus {
  const match = STATUS_LINE_RE.exec(line);
  if (!match) {
    throw new HttpClientError("MalformedStatusLine", `Malformed status line: ${JSON.stringify(line)}`, {
      stage: "status-line",
    });
  }
  const status = parseInt(match[2], 10);
  if (status < 100 || status > 599) {
    throw new HttpClientError("MalformedStatusLine", `Status code out of range: ${status}`, {
      stage: "status-line",
    });
  }
  return { httpVersion: match[1], status, statusText: match[3] ?? "" };
}

/** Split a header line on its first colon; the value is trimmed, the name must be a token */
export function parseHeaderField(line: string): [name: string, value: string] {
  const colonIdx = line.indexOf(":");
  if (colonIdx === -1) {
    throw new HttpClientError("MalformedHeader", `Header line without colon: ${JSON.stringify(line)}`, {
      stage: "headers",
    });
  }
  const name = line.substring(0, colonIdx);
  const value = line.substring(colonIdx + 1).trim();
  if (!isToken(name)) {
    throw new HttpClientError("MalformedHeader", `Invalid header name: ${JSON.stringify(name)}`, {
      stage: "headers",
    });
  }
  if (INVALID_VALUE_CHAR_RE.test(value)) {
    throw new HttpClientError("MalformedHeader", `Invalid header value for "${name}"`, {
      stage: "headers",
    });
  }
  return [name, value];
}
