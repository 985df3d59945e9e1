/**
 * Header utilities for HTTP/1.1.
 * Names are matched case-insensitively but sent with the case they were given;
 * repeated names are kept in arrival order.
 */

import { HttpClientError } from "../errors.js";

const INVALID_HEADER_CHAR_RE = /[\r\n\0]/;

// RFC 7230 3.2.6. Field Value Components: token = 1*tchar
// tchar = "!" / "#" / "$" / "%" / "&" / "'" / "*" / "+" / "-" / "." / "^" / "_" / "`" / "|" / "~" / DIGIT / ALPHA
const TOKEN_RE = /^[a-zA-Z0-9!#$%&'*+.^_`|~-]+$/;

export function isToken(value: string): boolean {
  return TOKEN_RE.test(value);
}

function invalidRequest(message: string): HttpClientError {
  return new HttpClientError("InvalidRequest", message, { stage: "resolve" });
}

/**
 * Validate header name against RFC 7230 token characters.
 */
export function validateHeaderName(name: string): void {
  if (!TOKEN_RE.test(name)) {
    throw invalidRequest(`Invalid header name: ${JSON.stringify(name)} contains invalid characters`);
  }
}

/**
 * Validate header value against CR/LF/NUL injection.
 */
export function validateHeaderValue(name: string, value: string): void {
  if (INVALID_HEADER_CHAR_RE.test(value)) {
    throw invalidRequest(`Invalid header value for "${name}": contains CR/LF/NUL`);
  }
}

/**
 * Validate HTTP method to prevent CRLF injection and ensure valid token characters.
 */
export function validateMethod(method: string): void {
  if (!TOKEN_RE.test(method)) {
    throw invalidRequest(`Invalid method: ${JSON.stringify(method)} contains invalid characters`);
  }
}

export type HeaderEntry = readonly [name: string, value: string];

/** Headers input accepted by the public API. */
export type HeadersInit = HeaderList | Record<string, string> | ReadonlyArray<HeaderEntry>;

/**
 * Ordered, case-insensitive header list.
 * Unlike a plain object, it keeps duplicates and the order they were added in.
 */
export class HeaderList implements Iterable<HeaderEntry> {
  private entries: Array<[string, string]> = [];

  constructor(init?: HeadersInit) {
    if (!init) return;
    if (init instanceof HeaderList) {
      for (const [name, value] of init) this.append(name, value);
    } else if (isEntryArray(init)) {
      for (const [name, value] of init) this.append(name, value);
    } else {
      for (const [name, value] of Object.entries(init)) this.append(name, value);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  append(name: string, value: string): void {
    validateHeaderName(name);
    validateHeaderValue(name, value);
    this.entries.push([name, value]);
  }

  /** Replace every value of `name` with one entry, kept at the first occurrence's position */
  set(name: string, value: string): void {
    validateHeaderName(name);
    validateHeaderValue(name, value);
    const lower = name.toLowerCase();
    const idx = this.entries.findIndex(([n]) => n.toLowerCase() === lower);
    if (idx === -1) {
      this.entries.push([name, value]);
      return;
    }
    this.entries[idx] = [name, value];
    this.entries = this.entries.filter(([n], i) => i <= idx || n.toLowerCase() !== lower);
  }

  /** First value for `name`, or undefined */
  get(name: string): string | undefined {
    const lower = name.toLowerCase();
    return this.entries.find(([n]) => n.toLowerCase() === lower)?.[1];
  }

  getAll(name: string): string[] {
    const lower = name.toLowerCase();
    return this.entries.filter(([n]) => n.toLowerCase() === lower).map(([, v]) => v);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  delete(name: string): void {
    const lower = name.toLowerCase();
    this.entries = this.entries.filter(([n]) => n.toLowerCase() !== lower);
  }

  [Symbol.iterator](): Iterator<HeaderEntry> {
    return this.entries.map((entry): HeaderEntry => [entry[0], entry[1]])[Symbol.iterator]();
  }

  /** Serialize into HTTP/1.1 format: "Name: Value\r\n" per entry */
  serialize(): string {
    let result = "";
    for (const [name, value] of this.entries) {
      result += `${name}: ${value}\r\n`;
    }
    return result;
  }
}

function isEntryArray(init: Record<string, string> | ReadonlyArray<HeaderEntry>): init is ReadonlyArray<HeaderEntry> {
  return Array.isArray(init);
}

/**
 * Parse a "Name: value" line as typed on a command line.
 */
export function parseHeaderLine(line: string): HeaderEntry {
  const colonIdx = line.indexOf(":");
  if (colonIdx <= 0) {
    throw invalidRequest(`Invalid header: ${JSON.stringify(line)} (expected "Name: value")`);
  }
  const name = line.substring(0, colonIdx).trim();
  const value = line.substring(colonIdx + 1).trim();
  validateHeaderName(name);
  validateHeaderValue(name, value);
  return [name, value];
}
