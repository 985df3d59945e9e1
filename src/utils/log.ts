/**
 * Tagged debug lines ("[socket] connect(...)").
 * Silent until a sink is installed; the CLI installs a stderr sink for --verbose.
 */

export type LogSink = (line: string) => void;

let sink: LogSink | null = null;

export function setLogSink(next: LogSink | null): void {
  sink = next;
}

export function debug(scope: string, message: string): void {
  if (sink) sink(`[${scope}] ${message}`);
}
