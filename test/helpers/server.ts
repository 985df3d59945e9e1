import { Buffer } from "node:buffer";
import * as net from "node:net";

export interface ReceivedRequest {
  method: string;
  target: string;
  /** Raw request head without the final blank line */
  head: string;
  body: string;
}

/** Returns the raw response bytes; the connection is closed after they are written */
export type Handler = (request: ReceivedRequest) => string | Buffer;

export interface TestServer {
  port: number;
  url(path: string): string;
  requests: ReceivedRequest[];
  close(): Promise<void>;
}

/**
 * Minimal in-process HTTP/1.1 server on 127.0.0.1.
 * Reads one request per connection (Content-Length bodies only).
 */
export async function startServer(handler: Handler): Promise<TestServer> {
  const requests: ReceivedRequest[] = [];
  const sockets = new Set<net.Socket>();

  const server = net.createServer(socket => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
    socket.on("error", () => socket.destroy());

    let buffer = Buffer.alloc(0);
    let answered = false;
    socket.on("data", chunk => {
      if (answered) return;
      buffer = Buffer.concat([buffer, chunk]);
      const request = readRequest(buffer);
      if (!request) return;
      answered = true;
      requests.push(request);
      socket.end(handler(request));
    });
  });

  await new Promise<void>(resolve => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : 0;

  return {
    port,
    url: path => `http://127.0.0.1:${port}${path}`,
    requests,
    close: () =>
      new Promise<void>(resolve => {
        for (const socket of sockets) socket.destroy();
        server.close(() => resolve());
      }),
  };
}

function readRequest(buffer: Buffer): ReceivedRequest | null {
  const headEnd = buffer.indexOf("\r\n\r\n");
  if (headEnd === -1) return null;

  // Keeps the CRLF that ends the last header line
  const head = buffer.subarray(0, headEnd + 2).toString("latin1");
  const length = /^content-length:\s*(\d+)$/im.exec(head);
  const bodyLength = length ? parseInt(length[1], 10) : 0;
  const body = buffer.subarray(headEnd + 4);
  if (body.length < bodyLength) return null;

  const [method = "", target = ""] = head.split("\r\n")[0].split(" ");
  return { method, target, head, body: body.subarray(0, bodyLength).toString() };
}

/** Build a raw response with Content-Length */
export function respond(status: string, body = "", headers: Record<string, string> = {}): string {
  const lines = [`HTTP/1.1 ${status}`];
  for (const [name, value] of Object.entries(headers)) lines.push(`${name}: ${value}`);
  lines.push(`Content-Length: ${Buffer.byteLength(body)}`);
  return `${lines.join("\r\n")}\r\n\r\n${body}`;
}

/** A port nothing listens on */
export async function unusedPort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>(resolve => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : 0;
  await new Promise<void>(resolve => server.close(() => resolve()));
  return port;
}
