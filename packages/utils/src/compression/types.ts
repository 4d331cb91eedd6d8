/**
 * Compression types shared by the streaming codec engines
 */

/**
 * Outcome of a single incremental codec call.
 *
 * - "ok": all available input was processed (more input may be needed)
 * - "buffer-full": the output space ran out; grow the buffer and call again
 * - "stream-end": the compressed stream is complete
 */
export type CodecStatus = "ok" | "buffer-full" | "stream-end";

/**
 * Flush behaviour for an incremental codec call.
 *
 * "sync" emits all pending output aligned on a byte boundary, ending the
 * compressed block with an empty stored block (`00 00 FF FF`).
 */
export type FlushMode = "none" | "sync";

/**
 * Options for the raw deflate engine
 */
export interface DeflateEngineOptions {
  /** Compression level (0-9, where 0 = no compression, 9 = maximum compression) */
  level?: number;
  /** Base-two logarithm of the LZ77 window size (9-15, default 15) */
  windowBits?: number;
}

/**
 * Options for the raw inflate engine
 */
export interface InflateEngineOptions {
  /** Base-two logarithm of the LZ77 window size (9-15, default 15) */
  windowBits?: number;
}

/**
 * Error thrown when compression/decompression fails
 */
export class CompressionError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
    public readonly code?: number,
  ) {
    super(message);
    this.name = "CompressionError";
  }
}

export const MIN_WINDOW_BITS = 9;
export const MAX_WINDOW_BITS = 15;
