/**
 * Extension-related error classes.
 */

/**
 * Base error for all extension operations.
 */
export class ExtensionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExtensionError";
  }
}

/**
 * Decompressed message would exceed the configured buffer limit.
 */
export class BufferLimitExceededError extends ExtensionError {
  readonly limit: number;

  constructor(limit: number) {
    super(`decompressed message too large (limit: ${limit} bytes)`);
    this.name = "BufferLimitExceededError";
    this.limit = limit;
  }
}

/**
 * The compressor did not produce the output the protocol requires.
 */
export class CodecInvariantError extends ExtensionError {
  constructor(message: string) {
    super(message);
    this.name = "CodecInvariantError";
  }
}

/**
 * Negotiation results that no extension can accept.
 */
export class NegotiationError extends ExtensionError {
  constructor(message: string) {
    super(message);
    this.name = "NegotiationError";
  }
}

/**
 * Malformed Sec-WebSocket-Extensions header value.
 */
export class ExtensionHeaderError extends ExtensionError {
  readonly header: string;

  constructor(message: string, header: string) {
    super(message);
    this.name = "ExtensionHeaderError";
    this.header = header;
  }
}
