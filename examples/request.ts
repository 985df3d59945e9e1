/**
 * Minimal library example.
 *
 *   npx tsx examples/request.ts https://example.com/
 */
import { isHttpClientError, request, setLogSink } from "../src/index.js";

const url = process.argv[2] ?? "https://example.com/";

setLogSink(line => console.error(line));

try {
  const response = await request(url, { redirect: "follow", maxRedirects: 5 });
  console.log(`${response.status} ${response.statusText} (${response.framing.kind}, ${response.redirects} redirects)`);
  for (const [name, value] of response.headers) console.log(`${name}: ${value}`);
  console.log();
  console.log(response.text().slice(0, 500));
} catch (err) {
  if (isHttpClientError(err)) {
    console.error(`${err.code} during ${err.stage}: ${err.message}`);
    process.exitCode = 1;
  } else {
    throw err;
  }
}
