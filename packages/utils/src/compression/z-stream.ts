/**
 * Helpers shared by the pako-backed engines.
 */

import { constants } from "pako";
import type { CodecStatus, FlushMode } from "./types.js";

/**
 * Fields of the z_stream record read and written by pako's zlib functions.
 */
export interface ZStreamFields {
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

export function createZStream(): ZStreamFields {
  return {
    input: null,
    next_in: 0,
    avail_in: 0,
    total_in: 0,
    output: null,
    next_out: 0,
    avail_out: 0,
    total_out: 0,
    msg: "",
    state: null,
    data_type: 0,
    adler: 0,
  };
}

export function toZlibFlush(flush: FlushMode): number {
  return flush === "sync" ? constants.Z_SYNC_FLUSH : constants.Z_NO_FLUSH;
}

/**
 * Map a zlib return code to a codec status.
 *
 * zlib reports a full output buffer either as Z_OK (progress was made)
 * or as Z_BUF_ERROR (no progress possible); both leave `avail_out` at
 * zero. Z_BUF_ERROR with output space left means the input ran dry.
 *
 * @returns null for real errors (Z_STREAM_ERROR, Z_DATA_ERROR, Z_NEED_DICT, ...)
 */
export function toCodecStatus(ret: number, availOut: number): CodecStatus | null {
  switch (ret) {
    case constants.Z_STREAM_END:
      return "stream-end";
    case constants.Z_OK:
    case constants.Z_BUF_ERROR:
      return availOut === 0 ? "buffer-full" : "ok";
    default:
      return null;
  }
}
