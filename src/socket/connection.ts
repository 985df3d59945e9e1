/**
 * An open TCP or TLS socket owned by exactly one exchange.
 */
import type { Socket } from "node:net";
import { TLSSocket } from "node:tls";
import { errorMessage } from "../errors.js";
import { debug } from "../utils/log.js";
import type { ParsedUrl } from "../utils/url.js";

export class Connection {
  readonly socket: Socket;
  readonly url: ParsedUrl;
  private closed = false;

  constructor(socket: Socket, url: ParsedUrl) {
    this.socket = socket;
    this.url = url;
    // Errors while an exchange runs are handled by its own listener; this one
    // covers the gap between the exchange finishing and close()
    socket.on("error", (err: Error) => {
      debug("socket", `error(${url.hostname}:${url.port}) ${errorMessage(err)}`);
    });
  }

  /** Negotiated TLS protocol ("TLSv1.3"), or null for plain TCP */
  get tlsProtocol(): string | null {
    return this.socket instanceof TLSSocket ? this.socket.getProtocol() : null;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Close the socket. Safe to call more than once; only the first call acts. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    debug("socket", `close(${this.url.hostname}:${this.url.port})`);
    this.socket.destroy();
  }
}
