/**
 * Output sink: where decoded response bytes end up.
 */
import { Buffer } from "node:buffer";
import type { HeaderList } from "../utils/headers.js";

export interface ResponseHeadLike {
  httpVersion: string;
  status: number;
  statusText: string;
  headers: HeaderList;
}

/** Status line and header block as received, ending with the blank line */
export function formatHead(response: ResponseHeadLike): string {
  const statusLine = response.statusText
    ? `${response.httpVersion} ${response.status} ${response.statusText}`
    : `${response.httpVersion} ${response.status}`;
  return `${statusLine}\r\n${response.headers.serialize()}\r\n`;
}

/** Bytes to emit for a response: optionally the head, then the body */
export function renderResponse(response: ResponseHeadLike & { body: Buffer }, includeHead: boolean): Buffer {
  if (!includeHead) return response.body;
  return Buffer.concat([Buffer.from(formatHead(response), "latin1"), response.body]);
}
