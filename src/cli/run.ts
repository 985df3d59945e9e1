/**
 * Command-line runner: arguments in, exit code out.
 */
import { Buffer } from "node:buffer";
import { readFile, writeFile } from "node:fs/promises";
import { request, type HttpResponse } from "../client.js";
import { errorMessage, isHttpClientError } from "../errors.js";
import { HeaderList } from "../utils/headers.js";
import { setLogSink } from "../utils/log.js";
import { parseCliArgs, renderUsage, type CliOptions } from "./args.js";
import { formatHead, renderResponse } from "./output.js";

export interface CliIo {
  stdout: { write(chunk: Uint8Array | string): unknown };
  stderr: { write(chunk: string): unknown };
  env: Readonly<Record<string, string | undefined>>;
  readFile(path: string): Promise<Buffer>;
  writeFile(path: string, data: Uint8Array): Promise<void>;
}

export const processIo: CliIo = {
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
  readFile: path => readFile(path),
  writeFile: (path, data) => writeFile(path, data),
};

/** Exit code for --fail on an HTTP error status */
export const EXIT_HTTP_ERROR = 22;

/**
 * Run the client for one command line and return the process exit code.
 */
export async function runCli(args: readonly string[], io: CliIo = processIo): Promise<number> {
  const parsed = parseCliArgs(args, io.env);
  if (!parsed.ok) {
    io.stderr.write(`Error: ${parsed.message}\n`);
    io.stderr.write("Usage: wirecurl [OPTIONS] <URL>\n");
    io.stderr.write("Try 'wirecurl --help' for more information.\n");
    return 1;
  }
  if (parsed.help) {
    io.stdout.write(renderUsage());
    return 0;
  }

  const options = parsed.options;
  const report = (line: string) => {
    if (!options.silent) io.stderr.write(`${line}\n`);
  };

  if (options.verbose && !options.silent) {
    setLogSink(line => io.stderr.write(`${line}\n`));
  }
  try {
    let body: Buffer | null;
    try {
      body = await loadBody(options, io);
    } catch (err) {
      report(`Error: ${errorMessage(err)}`);
      return 1;
    }

    let response: HttpResponse;
    try {
      response = await request(options.url, {
        method: options.method,
        headers: buildHeaders(options),
        body,
        credentials: options.user,
        redirect: options.location ? "follow" : "manual",
        maxRedirects: options.maxRedirects,
        connectTimeout: options.connectTimeout,
        readTimeout: options.readTimeout,
        minTlsVersion: options.tlsVersion,
        maxResponseSize: options.maxFilesize,
      });
    } catch (err) {
      if (isHttpClientError(err) && options.verbose) {
        const read = err.bytesRead === undefined ? "" : `, ${err.bytesRead} bytes read`;
        report(`Error: ${err.message} [${err.code} during ${err.stage}${read}]`);
      } else {
        report(`Error: ${errorMessage(err)}`);
      }
      return 1;
    }

    return await emit(response, options, io, report);
  } finally {
    setLogSink(null);
  }
}

async function emit(
  response: HttpResponse,
  options: CliOptions,
  io: CliIo,
  report: (line: string) => void,
): Promise<number> {
  if (response.status >= 400) {
    if (options.fail) return EXIT_HTTP_ERROR;
    report(`HTTP Error: ${response.status}`);
    if (response.body.length > 0) report(`Response body: ${response.text()}`);
    return 1;
  }

  if (options.head) {
    io.stdout.write(formatHead(response));
    return 0;
  }

  const data = renderResponse(response, options.include);
  if (options.output === undefined) {
    io.stdout.write(data);
    return 0;
  }

  try {
    await io.writeFile(options.output, data);
  } catch (err) {
    report(`Error: Failed to write '${options.output}': ${errorMessage(err)}`);
    return 1;
  }
  report(`Response body saved to '${options.output}'`);
  return 0;
}

async function loadBody(options: CliOptions, io: CliIo): Promise<Buffer | null> {
  const { data } = options;
  if (data === undefined) return null;
  if (!data.startsWith("@")) return Buffer.from(data, "utf-8");

  const path = data.substring(1);
  try {
    return await io.readFile(path);
  } catch (err) {
    throw new Error(`Failed to read data file '${path}': ${errorMessage(err)}`, { cause: err });
  }
}

function buildHeaders(options: CliOptions): HeaderList {
  const headers = new HeaderList(options.headers);
  if (options.userAgent !== undefined) headers.set("User-Agent", options.userAgent);
  return headers;
}
