/**
 * Client defaults and environment overrides.
 */

export const VERSION = "0.1.0";

export const TLS_VERSIONS = ["1.0", "1.1", "1.2", "1.3"] as const;
export type TlsVersion = (typeof TLS_VERSIONS)[number];

export interface ClientDefaults {
  readonly userAgent: string;
  readonly connectTimeout: number;
  readonly readTimeout: number;
  readonly writeTimeout: number;
  readonly maxResponseSize: number;
  readonly maxHeaderSize: number;
  readonly maxRedirects: number;
  readonly minTlsVersion: TlsVersion;
}

export const DEFAULTS: ClientDefaults = {
  userAgent: `wirecurl/${VERSION}`,
  connectTimeout: 10_000,
  readTimeout: 30_000,
  writeTimeout: 10_000,
  /** Cap on decoded body bytes (10 MiB) */
  maxResponseSize: 10 * 1024 * 1024,
  /** Cap on status line + header block bytes (80 KiB) */
  maxHeaderSize: 80 * 1024,
  maxRedirects: 10,
  minTlsVersion: "1.2",
};

/** Environment variable consulted for the minimum TLS version */
export const TLS_VERSION_ENV = "WIRECURL_TLS_VERSION";
