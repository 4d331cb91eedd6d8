/**
 * Compression module
 *
 * Streaming raw DEFLATE/INFLATE engines with persistent state, suitable
 * for protocols that compress a sequence of messages as one stream and
 * flush between them (e.g. WebSocket permessage-deflate).
 *
 * Primary API:
 * - DeflateEngine: incremental compression into a GrowableBuffer
 * - InflateEngine: incremental decompression into a GrowableBuffer
 */

export * from "./pako-deflate.js";
export * from "./pako-inflate.js";
export * from "./types.js";
