/**
 * Incremental raw INFLATE decompression on top of pako's low-level zlib API.
 *
 * The engine keeps its z_stream (and therefore its sliding window) across
 * calls, which is what a receiver needs when the sender reuses its LZ77
 * history between messages. Consumption is reported through `totalIn`,
 * the same counter strm.total_in exposes in zlib.
 */

import { constants } from "pako";
import * as zlib from "pako/lib/zlib/inflate.js";
import type { GrowableBuffer } from "../buffers/growable-buffer.js";
import {
  type CodecStatus,
  CompressionError,
  type FlushMode,
  type InflateEngineOptions,
  MAX_WINDOW_BITS,
  MIN_WINDOW_BITS,
} from "./types.js";
import { createZStream, toCodecStatus, toZlibFlush } from "./z-stream.js";

type ZStream = Parameters<typeof zlib.inflateInit2>[0];

export class InflateEngine {
  readonly windowBits: number;
  private readonly strm: ZStream = createZStream();
  private closed = false;

  constructor(options: InflateEngineOptions = {}) {
    this.windowBits = options.windowBits ?? MAX_WINDOW_BITS;
    if (
      !Number.isInteger(this.windowBits) ||
      this.windowBits < MIN_WINDOW_BITS ||
      this.windowBits > MAX_WINDOW_BITS
    ) {
      throw new CompressionError(
        `window bits ${this.windowBits} must be within [${MIN_WINDOW_BITS}, ${MAX_WINDOW_BITS}]`,
      );
    }

    // windowBits: negative for raw deflate
    const ret = zlib.inflateInit2(this.strm, -this.windowBits);
    if (ret !== constants.Z_OK) {
      throw new CompressionError(
        `Pako inflateInit2 failed: ${this.strm.msg || `error code ${ret}`}`,
        undefined,
        ret,
      );
    }
  }

  get totalIn(): number {
    return this.strm.total_in;
  }

  get totalOut(): number {
    return this.strm.total_out;
  }

  /**
   * Decompress `input` into the spare capacity of `output`.
   *
   * @param limit Upper bound for the number of bytes written by this call
   */
  decompress(
    input: Uint8Array,
    output: GrowableBuffer,
    flush: FlushMode,
    limit = Number.POSITIVE_INFINITY,
  ): CodecStatus {
    this.ensureOpen();
    const strm = this.strm;
    strm.input = input;
    strm.next_in = 0;
    strm.avail_in = input.length;
    strm.output = output.bytes;
    strm.next_out = output.length;
    strm.avail_out = Math.min(output.spare, limit);

    const ret = zlib.inflate(strm, toZlibFlush(flush));
    output.length = strm.next_out;
    const status = toCodecStatus(ret, strm.avail_out);

    strm.input = null;
    strm.output = null;

    if (status === null) {
      throw new CompressionError(
        `Pako decompression failed: ${strm.msg || `error code ${ret}`}`,
        undefined,
        ret,
      );
    }
    return status;
  }

  /**
   * Forget the sliding window so the next message is decoded without
   * references to earlier ones.
   */
  reset(): void {
    this.ensureOpen();
    const ret = zlib.inflateReset(this.strm);
    if (ret !== constants.Z_OK) {
      throw new CompressionError(`Pako inflateReset failed: error code ${ret}`, undefined, ret);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    zlib.inflateEnd(this.strm);
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new CompressionError("inflate engine is closed");
    }
  }
}
