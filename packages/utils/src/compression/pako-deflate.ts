/**
 * Incremental raw DEFLATE compression on top of pako's low-level zlib API.
 *
 * Unlike `pako.deflateRaw`, the engine keeps its z_stream between calls so
 * the LZ77 history survives from one message to the next (context
 * takeover) until `reset()` is called. Output is written straight into the
 * spare capacity of a caller-owned GrowableBuffer.
 */

import { constants } from "pako";
import * as zlib from "pako/lib/zlib/deflate.js";
import type { GrowableBuffer } from "../buffers/growable-buffer.js";
import {
  type CodecStatus,
  CompressionError,
  type DeflateEngineOptions,
  type FlushMode,
  MAX_WINDOW_BITS,
  MIN_WINDOW_BITS,
} from "./types.js";
import { createZStream, toCodecStatus, toZlibFlush } from "./z-stream.js";

type ZStream = Parameters<typeof zlib.deflateInit2>[0];

// zlib defaults for memLevel
const DEFAULT_MEM_LEVEL = 8;
// The only compression method zlib defines
const Z_DEFLATED = 8;

export class DeflateEngine {
  readonly level: number;
  readonly windowBits: number;
  private readonly strm: ZStream = createZStream();
  private closed = false;

  constructor(options: DeflateEngineOptions = {}) {
    this.level = options.level ?? 1;
    this.windowBits = options.windowBits ?? MAX_WINDOW_BITS;

    if (!Number.isInteger(this.level) || this.level < 0 || this.level > 9) {
      throw new CompressionError(`invalid compression level: ${this.level}`);
    }
    if (
      !Number.isInteger(this.windowBits) ||
      this.windowBits < MIN_WINDOW_BITS ||
      this.windowBits > MAX_WINDOW_BITS
    ) {
      throw new CompressionError(
        `window bits ${this.windowBits} must be within [${MIN_WINDOW_BITS}, ${MAX_WINDOW_BITS}]`,
      );
    }

    // Negative window bits select raw deflate (no zlib header or checksum)
    const ret = zlib.deflateInit2(
      this.strm,
      this.level,
      Z_DEFLATED,
      -this.windowBits,
      DEFAULT_MEM_LEVEL,
      constants.Z_DEFAULT_STRATEGY,
    );
    if (ret !== constants.Z_OK) {
      throw new CompressionError(
        `Pako deflateInit2 failed: ${this.strm.msg || `error code ${ret}`}`,
        undefined,
        ret,
      );
    }
  }

  /** Input bytes consumed since creation or the last reset */
  get totalIn(): number {
    return this.strm.total_in;
  }

  /** Output bytes produced since creation or the last reset */
  get totalOut(): number {
    return this.strm.total_out;
  }

  /**
   * Compress `input` into the spare capacity of `output`.
   *
   * Not all input is necessarily consumed: when the output space runs
   * out the call returns "buffer-full" and `totalIn` tells how far the
   * engine got.
   *
   * @param limit Upper bound for the number of bytes written by this call
   */
  compress(
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

    const ret = zlib.deflate(strm, toZlibFlush(flush));
    output.length = strm.next_out;
    const status = toCodecStatus(ret, strm.avail_out);

    // Do not keep references to caller-owned arrays
    strm.input = null;
    strm.output = null;

    if (status === null) {
      throw new CompressionError(
        `Pako compression failed: ${strm.msg || `error code ${ret}`}`,
        undefined,
        ret,
      );
    }
    return status;
  }

  /**
   * Drop the compression history. Level and window size are kept.
   */
  reset(): void {
    this.ensureOpen();
    const ret = zlib.deflateReset(this.strm);
    if (ret !== constants.Z_OK) {
      throw new CompressionError(`Pako deflateReset failed: error code ${ret}`, undefined, ret);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    zlib.deflateEnd(this.strm);
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new CompressionError("deflate engine is closed");
    }
  }
}
