/**
 * Error taxonomy for the request/response engine.
 * Every failure is terminal for the attempt that raised it; nothing here is retried.
 */

export type HttpErrorCode =
  | "InvalidUrl"
  | "InvalidRequest"
  | "ConnectError"
  | "TlsError"
  | "ReadTimeout"
  | "WriteTimeout"
  | "MalformedStatusLine"
  | "MalformedHeader"
  | "HeadersTooLarge"
  | "TruncatedBody"
  | "MalformedChunkSize"
  | "MalformedChunkTerminator"
  | "ResponseTooLarge"
  | "MissingRedirectTarget"
  | "TooManyRedirects";

/** Where in an exchange the failure happened */
export type ExchangeStage =
  | "resolve"
  | "connect"
  | "handshake"
  | "write"
  | "status-line"
  | "headers"
  | "body"
  | "redirect";

export interface HttpErrorDetails {
  stage: ExchangeStage;
  /** Response bytes consumed before the failure, when a response was being read */
  bytesRead?: number;
  cause?: unknown;
}

export class HttpClientError extends Error {
  override readonly name = "HttpClientError";
  readonly code: HttpErrorCode;
  readonly stage: ExchangeStage;
  readonly bytesRead: number | undefined;

  constructor(code: HttpErrorCode, message: string, details: HttpErrorDetails) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.code = code;
    this.stage = details.stage;
    this.bytesRead = details.bytesRead;
  }
}

export function isHttpClientError(err: unknown, code?: HttpErrorCode): err is HttpClientError {
  return err instanceof HttpClientError && (code === undefined || err.code === code);
}

/** Message of any thrown value */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
