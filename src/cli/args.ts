import { parseArgs } from "node:util";
import { z } from "zod";
import { DEFAULTS, TLS_VERSIONS, TLS_VERSION_ENV, type TlsVersion } from "../config.js";
import { errorMessage } from "../errors.js";
import { parseHeaderLine, type HeaderEntry } from "../utils/headers.js";

export interface CliOptions {
  readonly url: string;
  readonly method: string;
  readonly headers: HeaderEntry[];
  /** Raw --data value; "@file" is read by the runner */
  readonly data?: string;
  readonly output?: string;
  readonly include: boolean;
  readonly head: boolean;
  readonly location: boolean;
  readonly silent: boolean;
  readonly fail: boolean;
  readonly verbose: boolean;
  readonly userAgent?: string;
  readonly user?: string;
  readonly tlsVersion: TlsVersion;
  readonly maxRedirects: number;
  /** ms */
  readonly connectTimeout: number;
  /** ms */
  readonly readTimeout: number;
  readonly maxFilesize: number;
}

export type CliParseResult =
  | { readonly ok: true; readonly help: true }
  | { readonly ok: true; readonly help: false; readonly options: CliOptions }
  | { readonly ok: false; readonly message: string };

const usageLines = [
  "wirecurl - a minimal HTTP/1.1 client",
  "",
  "Usage:",
  "    wirecurl [OPTIONS] <URL>",
  "",
  "Options:",
  "    -o, --output <FILE>          Save the response body to a file",
  "    -X, --request <METHOD>       HTTP method to use (default: GET)",
  "    -m, --method <METHOD>        Alias for --request",
  "    -H, --header <HEADER>        Add a header to the request (repeatable)",
  "    -d, --data <DATA>            Send DATA as the request body (@file reads a file)",
  "    -i, --include                Include response headers in the output",
  "    -I, --head                   Fetch headers only (HEAD request)",
  "    -L, --location               Follow redirects",
  "    -s, --silent                 Print nothing but the response",
  "    -f, --fail                   Exit with code 22 and no output on HTTP errors",
  "    -A, --user-agent <NAME>      User-Agent header value",
  "    -u, --user <USER:PASS>       Basic authentication credentials",
  "    -v, --verbose                Print connection details on stderr",
  "    -h, --help                   Show this help message",
  "        --tls-version <VERSION>  Minimum TLS version (1.0, 1.1, 1.2, 1.3; default 1.2)",
  "        --max-redirs <NUM>       Maximum redirects to follow (default 10)",
  "        --connect-timeout <SEC>  Connect + TLS handshake timeout (default 10)",
  "        --read-timeout <SEC>     Idle timeout while reading the response (default 30)",
  "        --max-filesize <BYTES>   Largest response body accepted (default 10485760)",
  "",
  "Environment:",
  `    ${TLS_VERSION_ENV}         Minimum TLS version (overridden by --tls-version)`,
  "",
  "Examples:",
  "    wirecurl https://example.com",
  "    wirecurl -i -L https://example.com/redirect",
  "    wirecurl -X POST -H 'Content-Type: application/json' -d '{\"key\":\"value\"}' https://api.example.com",
  "    wirecurl -d @data.json -o response.json https://api.example.com",
  "",
] as const;

const optionSchema = {
  output: { type: "string", short: "o" },
  request: { type: "string", short: "X" },
  method: { type: "string", short: "m" },
  header: { type: "string", short: "H", multiple: true },
  data: { type: "string", short: "d" },
  include: { type: "boolean", short: "i", default: false },
  head: { type: "boolean", short: "I", default: false },
  location: { type: "boolean", short: "L", default: false },
  silent: { type: "boolean", short: "s", default: false },
  fail: { type: "boolean", short: "f", default: false },
  "user-agent": { type: "string", short: "A" },
  user: { type: "string", short: "u" },
  verbose: { type: "boolean", short: "v", default: false },
  help: { type: "boolean", short: "h", default: false },
  "tls-version": { type: "string" },
  "max-redirs": { type: "string" },
  "connect-timeout": { type: "string" },
  "read-timeout": { type: "string" },
  "max-filesize": { type: "string" },
} as const;

const seconds = z.coerce.number().positive().finite();

const limitsSchema = z.object({
  "tls-version": z.enum(TLS_VERSIONS).default(DEFAULTS.minTlsVersion),
  "max-redirs": z.coerce.number().int().min(0).default(DEFAULTS.maxRedirects),
  "connect-timeout": seconds.optional(),
  "read-timeout": seconds.optional(),
  "max-filesize": z.coerce.number().int().positive().default(DEFAULTS.maxResponseSize),
});

export function renderUsage(): string {
  return usageLines.join("\n");
}

function formatZodError(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid option value";
  return `Invalid value for --${issue.path.join(".")}: ${issue.message}`;
}

/**
 * Parse command-line arguments (without the node/script prefix).
 * The TLS version falls back to the environment before the built-in default.
 */
export function parseCliArgs(
  args: readonly string[],
  env: Readonly<Record<string, string | undefined>> = {},
): CliParseResult {
  try {
    const { values, positionals } = parseArgs({
      args: [...args],
      options: optionSchema,
      strict: true,
      allowPositionals: true,
    });

    if (values.help === true) return { ok: true, help: true };

    if (positionals.length === 0) return { ok: false, message: "Missing URL" };
    if (positionals.length > 1) {
      return { ok: false, message: `Expected one URL, got ${positionals.length}` };
    }

    const limits = limitsSchema.safeParse({
      "tls-version": values["tls-version"] ?? env[TLS_VERSION_ENV],
      "max-redirs": values["max-redirs"],
      "connect-timeout": values["connect-timeout"],
      "read-timeout": values["read-timeout"],
      "max-filesize": values["max-filesize"],
    });
    if (!limits.success) return { ok: false, message: formatZodError(limits.error) };

    const headers = (values.header ?? []).map(parseHeaderLine);
    const connectSeconds = limits.data["connect-timeout"];
    const readSeconds = limits.data["read-timeout"];

    return {
      ok: true,
      help: false,
      options: {
        url: positionals[0],
        method: selectMethod(values.head === true, values.request ?? values.method, values.data),
        headers,
        data: values.data,
        output: values.output,
        include: values.include === true,
        head: values.head === true,
        location: values.location === true,
        silent: values.silent === true,
        fail: values.fail === true,
        verbose: values.verbose === true,
        userAgent: values["user-agent"],
        user: values.user,
        tlsVersion: limits.data["tls-version"],
        maxRedirects: limits.data["max-redirs"],
        connectTimeout: connectSeconds === undefined ? DEFAULTS.connectTimeout : connectSeconds * 1000,
        readTimeout: readSeconds === undefined ? DEFAULTS.readTimeout : readSeconds * 1000,
        maxFilesize: limits.data["max-filesize"],
      },
    };
  } catch (error: unknown) {
    return { ok: false, message: errorMessage(error) };
  }
}

/** --head wins, then an explicit method, then POST when there is data */
function selectMethod(head: boolean, explicit: string | undefined, data: string | undefined): string {
  if (head) return "HEAD";
  if (explicit !== undefined) return explicit.toUpperCase();
  return data !== undefined ? "POST" : "GET";
}
