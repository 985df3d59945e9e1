/**
 * HTTP/1.1 chunked transfer encoding decoder.
 * Decodes chunked body data into raw content.
 *
 * Chunked format:
 *   <hex-size>[;ext]\r\n
 *   <data>\r\n
 *   ...
 *   0\r\n
 *   [trailer-field\r\n]*
 *   \r\n
 */
import { Buffer } from "node:buffer";
import { HttpClientError } from "../errors.js";

const enum ChunkedState {
  READ_SIZE,
  READ_DATA,
  READ_DATA_CRLF,
  READ_TRAILER,
  DONE,
}

/** A size line longer than this without CRLF cannot be valid */
const MAX_SIZE_LINE = 4096;
/** Trailer section cap, matching the header block cap */
const MAX_TRAILER_BYTES = 80 * 1024;
// 13 significant hex digits stay below Number.MAX_SAFE_INTEGER
const CHUNK_SIZE_RE = /^0*([0-9a-fA-F]{1,13})$/;

/**
 * Stateful chunked transfer encoding decoder.
 * Feed raw data via feed(), collect decoded bytes via getChunks().
 * Chunk payloads are emitted as they arrive.
 */
export class ChunkedDecoder {
  private state: ChunkedState = ChunkedState.READ_SIZE;
  private buffer: Buffer = Buffer.alloc(0);
  private remaining = 0;
  private trailerBytes = 0;
  private chunks: Buffer[] = [];

  /** Whether the terminal chunk and trailer section have been received */
  get done(): boolean {
    return this.state === ChunkedState.DONE;
  }

  /** Feed raw data into the decoder. Bytes after the end of the body are ignored. */
  feed(data: Buffer | Uint8Array): void {
    if (this.done) return;
    const buf = Buffer.isBuffer(data) ? data : Buffer.from(data);
    this.buffer = this.buffer.length > 0 ? Buffer.concat([this.buffer, buf]) : buf;
    this.process();
  }

  /** Get and clear decoded chunks */
  getChunks(): Buffer[] {
    const result = this.chunks;
    this.chunks = [];
    return result;
  }

  private process(): void {
    while (this.buffer.length > 0 && !this.done) {
      switch (this.state) {
        case ChunkedState.READ_SIZE: {
          const crlfIdx = this.findCRLF();
          if (crlfIdx === -1) {
            if (this.buffer.length > MAX_SIZE_LINE) {
              throw malformedSize(this.buffer.subarray(0, 32).toString("latin1"));
            }
            return; // need more data
          }

          const sizeLine = this.buffer.subarray(0, crlfIdx).toString("latin1");
          // Chunk size may have extensions after ";", ignore them
          const semiIdx = sizeLine.indexOf(";");
          const sizeStr = (semiIdx === -1 ? sizeLine : sizeLine.substring(0, semiIdx)).trim();
          const digits = CHUNK_SIZE_RE.exec(sizeStr);
          if (digits === null) {
            throw malformedSize(sizeLine);
          }

          this.remaining = parseInt(digits[1], 16);
          this.buffer = this.buffer.subarray(crlfIdx + 2);
          this.state = this.remaining === 0 ? ChunkedState.READ_TRAILER : ChunkedState.READ_DATA;
          break;
        }

        case ChunkedState.READ_DATA: {
          const take = Math.min(this.remaining, this.buffer.length);
          this.chunks.push(this.buffer.subarray(0, take));
          this.buffer = this.buffer.subarray(take);
          this.remaining -= take;
          if (this.remaining === 0) this.state = ChunkedState.READ_DATA_CRLF;
          break;
        }

        case ChunkedState.READ_DATA_CRLF: {
          if (this.buffer[0] !== 0x0d || (this.buffer.length > 1 && this.buffer[1] !== 0x0a)) {
            throw new HttpClientError("MalformedChunkTerminator", "Expected CRLF after chunk data", {
              stage: "body",
            });
          }
          if (this.buffer.length < 2) return; // need \n
          this.buffer = this.buffer.subarray(2);
          this.state = ChunkedState.READ_SIZE;
          break;
        }

        case ChunkedState.READ_TRAILER: {
          const crlfIdx = this.findCRLF();
          if (crlfIdx === -1) {
            if (this.trailerBytes + this.buffer.length > MAX_TRAILER_BYTES) {
              throw trailerTooLarge();
            }
            return;
          }
          this.trailerBytes += crlfIdx + 2;
          if (this.trailerBytes > MAX_TRAILER_BYTES) {
            throw trailerTooLarge();
          }
          // Trailer fields are read and discarded; an empty line ends the message
          this.buffer = this.buffer.subarray(crlfIdx + 2);
          if (crlfIdx === 0) {
            this.state = ChunkedState.DONE;
            this.buffer = Buffer.alloc(0);
          }
          break;
        }

        case ChunkedState.DONE:
          return;
      }
    }
  }

  private findCRLF(): number {
    for (let i = 0; i < this.buffer.length - 1; i++) {
      if (this.buffer[i] === 0x0d && this.buffer[i + 1] === 0x0a) {
        return i;
      }
    }
    return -1;
  }
}

function malformedSize(line: string): HttpClientError {
  return new HttpClientError("MalformedChunkSize", `Invalid chunk size: ${JSON.stringify(line)}`, {
    stage: "body",
  });
}

function trailerTooLarge(): HttpClientError {
  return new HttpClientError(
    "HeadersTooLarge",
    `Chunked trailer section too large (>${MAX_TRAILER_BYTES} bytes)`,
    { stage: "body" },
  );
}
