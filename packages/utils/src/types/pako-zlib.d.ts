/**
 * Type declarations for pako's low-level zlib API.
 *
 * Pako v2.x exports `lib/zlib/*` but ships no type definitions for them,
 * and @types/pako only covers the high-level wrappers. We only declare
 * the functions actually used by the deflate and inflate engines.
 */

declare module "pako/lib/zlib/deflate.js" {
  /**
   * z_stream structure used by zlib deflate functions
   */
  export interface ZStream {
    input: Uint8Array | null;
    next_in: number;
    avail_in: number;
    total_in: number;
    output: Uint8Array | null;
    next_out: number;
    avail_out: number;
    total_out: number;
    msg: string;
    state: unknown;
    data_type: number;
    adler: number;
  }

  /**
   * Initialize the internal stream state for compression
   *
   * @param windowBits Window size (negative for raw deflate, positive for zlib)
   * @returns Z_OK on success, error code otherwise
   */
  export function deflateInit2(
    strm: ZStream,
    level: number,
    method: number,
    windowBits: number,
    memLevel: number,
    strategy: number,
  ): number;

  /**
   * Compress as much data as possible into the output buffer
   *
   * @param flush Flush mode (Z_NO_FLUSH, Z_SYNC_FLUSH, Z_FINISH, ...)
   * @returns Z_OK, Z_STREAM_END, Z_BUF_ERROR, or error code
   */
  export function deflate(strm: ZStream, flush: number): number;

  /**
   * Discard the compression history, keeping level and window size
   */
  export function deflateReset(strm: ZStream): number;

  export function deflateEnd(strm: ZStream): number;
}

declare module "pako/lib/zlib/inflate.js" {
  /**
   * z_stream structure used by zlib inflate functions
   */
  export interface ZStream {
    input: Uint8Array | null;
    next_in: number;
    avail_in: number;
    total_in: number;
    output: Uint8Array | null;
    next_out: number;
    avail_out: number;
    total_out: number;
    msg: string;
    state: unknown;
    data_type: number;
    adler: number;
  }

  /**
   * Initialize the internal stream state for decompression
   *
   * @param windowBits Window size (negative for raw deflate, positive for zlib)
   * @returns Z_OK on success, error code otherwise
   */
  export function inflateInit2(strm: ZStream, windowBits: number): number;

  /**
   * Decompress data from the stream
   *
   * @returns Z_OK, Z_STREAM_END, Z_BUF_ERROR, or error code
   */
  export function inflate(strm: ZStream, flush: number): number;

  /**
   * Discard the decompression window, keeping the window size
   */
  export function inflateReset(strm: ZStream): number;

  export function inflateEnd(strm: ZStream): number;
}
