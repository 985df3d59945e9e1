/**
 * TLS/TCP connection factory.
 * Opens a socket for a ParsedUrl, wrapping it in TLS for https.
 */
import * as net from "node:net";
import * as tls from "node:tls";
import type { TlsVersion } from "../config.js";
import { HttpClientError, errorMessage } from "../errors.js";
import { debug } from "../utils/log.js";
import { connectHost, type ParsedUrl } from "../utils/url.js";
import { Connection } from "./connection.js";

export interface ConnectOptions {
  /** Time allowed for TCP connect plus TLS handshake (ms) */
  connectTimeout: number;
  /** Lowest TLS protocol version accepted for https */
  minTlsVersion: TlsVersion;
}

const NODE_TLS_VERSIONS: Record<TlsVersion, tls.SecureVersion> = {
  "1.0": "TLSv1",
  "1.1": "TLSv1.1",
  "1.2": "TLSv1.2",
  "1.3": "TLSv1.3",
};

const PROTOCOL_RANK: Record<string, number> = {
  TLSv1: 10,
  "TLSv1.1": 11,
  "TLSv1.2": 12,
  "TLSv1.3": 13,
};

const DNS_ERROR_CODES = new Set(["ENOTFOUND", "EAI_AGAIN", "EAI_FAIL", "EAI_NONAME"]);

/** Options passed to tls.connect: SNI (host names only), certificate checks, minimum version */
export function tlsConnectOptions(url: ParsedUrl, minTlsVersion: TlsVersion): tls.ConnectionOptions {
  const host = connectHost(url);
  return {
    host,
    port: url.port,
    servername: net.isIP(host) === 0 ? host : undefined,
    minVersion: NODE_TLS_VERSIONS[minTlsVersion],
    ALPNProtocols: ["http/1.1"],
    rejectUnauthorized: true,
  };
}

/** Whether a negotiated protocol name is at least the configured minimum */
export function meetsMinimumVersion(protocol: string | null, minTlsVersion: TlsVersion): boolean {
  if (protocol === null) return false;
  const rank = PROTOCOL_RANK[protocol];
  return rank !== undefined && rank >= PROTOCOL_RANK[NODE_TLS_VERSIONS[minTlsVersion]];
}

/**
 * Open a connection to the URL's host and port.
 * Rejects with ConnectError (DNS, refused, timeout) or TlsError (handshake, version).
 */
export async function createConnection(url: ParsedUrl, options: ConnectOptions): Promise<Connection> {
  const useTls = url.protocol === "https";
  debug("socket", `connect(${url.hostname}:${url.port} tls=${useTls})`);

  const socket = useTls
    ? tls.connect(tlsConnectOptions(url, options.minTlsVersion))
    : net.connect({ host: connectHost(url), port: url.port });

  await waitForConnect(socket, url, options.connectTimeout);

  const connection = new Connection(socket, url);
  if (useTls) {
    const protocol = connection.tlsProtocol;
    if (!meetsMinimumVersion(protocol, options.minTlsVersion)) {
      connection.close();
      throw new HttpClientError(
        "TlsError",
        `Negotiated ${protocol ?? "unknown protocol"} is below minimum TLS ${options.minTlsVersion}`,
        { stage: "handshake" },
      );
    }
    debug("socket", `tls(${url.hostname}) ${protocol}`);
  }
  return connection;
}

function waitForConnect(socket: net.Socket, url: ParsedUrl, timeout: number): Promise<void> {
  const useTls = socket instanceof tls.TLSSocket;
  const target = `${url.hostname}:${url.port}`;

  return new Promise((resolve, reject) => {
    let tcpConnected = false;
    let timer: ReturnType<typeof setTimeout> | null = null;

    const cleanup = () => {
      socket.removeListener("connect", onConnect);
      socket.removeListener("secureConnect", onSecureConnect);
      socket.removeListener("error", onError);
      if (timer) clearTimeout(timer);
    };

    const fail = (err: HttpClientError) => {
      cleanup();
      socket.destroy();
      reject(err);
    };

    const onConnect = () => {
      tcpConnected = true;
      if (!useTls) {
        cleanup();
        resolve();
      }
    };

    const onSecureConnect = () => {
      cleanup();
      resolve();
    };

    const onError = (err: Error) => {
      if (useTls && tcpConnected) {
        fail(
          new HttpClientError("TlsError", `TLS handshake with ${target} failed: ${err.message}`, {
            stage: "handshake",
            cause: err,
          }),
        );
        return;
      }
      const code = errnoCode(err);
      const message =
        code !== undefined && DNS_ERROR_CODES.has(code)
          ? `DNS resolution failed for ${url.hostname}: ${errorMessage(err)}`
          : `Connection to ${target} failed: ${errorMessage(err)}`;
      fail(new HttpClientError("ConnectError", message, { stage: "connect", cause: err }));
    };

    if (timeout > 0 && timeout < Infinity) {
      timer = setTimeout(() => {
        timer = null;
        fail(
          useTls && tcpConnected
            ? new HttpClientError("TlsError", `TLS handshake with ${target} timed out after ${timeout}ms`, {
                stage: "handshake",
              })
            : new HttpClientError("ConnectError", `Connection to ${target} timed out after ${timeout}ms`, {
                stage: "connect",
              }),
        );
      }, timeout);
    }

    socket.on("connect", onConnect);
    socket.on("secureConnect", onSecureConnect);
    socket.on("error", onError);
  });
}

function errnoCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}
