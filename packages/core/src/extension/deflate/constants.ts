/**
 * permessage-deflate constants (RFC 7692).
 */

export const PERMESSAGE_DEFLATE = "permessage-deflate";

export const SERVER_NO_CONTEXT_TAKEOVER = "server_no_context_takeover";
export const SERVER_MAX_WINDOW_BITS = "server_max_window_bits";
export const CLIENT_NO_CONTEXT_TAKEOVER = "client_no_context_takeover";
export const CLIENT_MAX_WINDOW_BITS = "client_max_window_bits";

/** Bytes the scratch buffer grows by when the codec runs out of space */
export const DEFAULT_GROW_BUFFER_SIZE = 4096;

/** Largest decompressed message accepted by default (256 MiB) */
export const DEFAULT_MAX_BUFFER_SIZE = 256 * 1024 * 1024;

/** Fastest zlib setting */
export const DEFAULT_COMPRESSION_LEVEL = 1;

/**
 * Window bits range accepted on the wire. The codec cannot use 8,
 * so negotiated values are raised to MIN_WINDOW_BITS.
 */
export const MIN_NEGOTIABLE_WINDOW_BITS = 8;
export const MIN_WINDOW_BITS = 9;
export const MAX_WINDOW_BITS = 15;

/**
 * Empty stored block ending every sync-flushed message.
 * Stripped by the sender, restored by the receiver (RFC 7692, 7.2.1 / 7.2.2).
 */
export const TRAILER = new Uint8Array([0x00, 0x00, 0xff, 0xff]);
