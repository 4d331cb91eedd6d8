/**
 * Compression extension "permessage-deflate" (RFC 7692).
 *
 * Outgoing Text and Binary messages are compressed with raw DEFLATE and
 * flagged with RSV1; incoming messages carrying RSV1 are decompressed.
 * Messages are sync-flushed, and the trailing empty stored block
 * (`00 00 FF FF`) is stripped before sending and restored on receipt.
 *
 * Window sizes of 8 bits are negotiable on the wire but not usable by the
 * codec, so they are raised to 9.
 */

import { GrowableBuffer } from "@ws-ext/utils/buffers";
import { type CodecStatus, DeflateEngine, InflateEngine } from "@ws-ext/utils/compression";
import { type Frame, formatHeader, OpCode, type ReservedOpCode } from "../../frame/types.js";
import { BufferLimitExceededError, CodecInvariantError } from "../errors.js";
import { Param } from "../param.js";
import type { Extension, ExtensionLogger, Mode, ReservedBits } from "../types.js";
import {
  CLIENT_MAX_WINDOW_BITS,
  CLIENT_NO_CONTEXT_TAKEOVER,
  DEFAULT_COMPRESSION_LEVEL,
  DEFAULT_GROW_BUFFER_SIZE,
  DEFAULT_MAX_BUFFER_SIZE,
  MAX_WINDOW_BITS,
  MIN_NEGOTIABLE_WINDOW_BITS,
  MIN_WINDOW_BITS,
  PERMESSAGE_DEFLATE,
  SERVER_MAX_WINDOW_BITS,
  SERVER_NO_CONTEXT_TAKEOVER,
  TRAILER,
} from "./constants.js";

const EMPTY = new Uint8Array(0);

/**
 * Options for the deflate extension.
 */
export interface DeflateOptions {
  /** Largest decompressed message size in bytes (default 256 MiB) */
  maxBufferSize?: number;
  /** Scratch buffer growth step in bytes (default 4096) */
  growBufferSize?: number;
  /** zlib compression level 0-9 (default 1, fastest) */
  compressionLevel?: number;
  /** Client only: largest window the server may compress with (9-15) */
  maxServerWindowBits?: number;
  /** Client only: largest window this client compresses with (9-15) */
  maxClientWindowBits?: number;
  logger?: ExtensionLogger;
}

interface Engines {
  encoder: DeflateEngine;
  decoder: InflateEngine;
}

/** Outcome of an accepted negotiation, applied as a whole */
interface Negotiated {
  ourWindowBits: number;
  theirWindowBits: number;
  noOurTakeover: boolean;
  noTheirTakeover: boolean;
  /** Parameters to answer with (server) or the unchanged offer (client) */
  response: Param[];
}

export class DeflateExtension implements Extension {
  readonly mode: Mode;
  private readonly logger?: ExtensionLogger;
  private readonly buffer = new GrowableBuffer();
  private readonly offer: Param[] = [];
  private compressionLevel = DEFAULT_COMPRESSION_LEVEL;
  private maxBufferSize = DEFAULT_MAX_BUFFER_SIZE;
  private growBufferSize = DEFAULT_GROW_BUFFER_SIZE;
  private ourWindowBits = MAX_WINDOW_BITS;
  private theirWindowBits = MAX_WINDOW_BITS;
  private noOurTakeover = false;
  private noTheirTakeover = false;
  private awaitLastFragment = false;
  /** Set on successful negotiation; its presence is the enabled state */
  private engines: Engines | null = null;

  constructor(mode: Mode, options: DeflateOptions = {}) {
    this.mode = mode;
    this.logger = options.logger;

    if (mode === "client") {
      this.offer.push(
        new Param(SERVER_NO_CONTEXT_TAKEOVER),
        new Param(CLIENT_NO_CONTEXT_TAKEOVER),
        new Param(CLIENT_MAX_WINDOW_BITS),
      );
    }

    if (options.maxBufferSize !== undefined) this.setMaxBufferSize(options.maxBufferSize);
    if (options.growBufferSize !== undefined) this.setGrowBufferSize(options.growBufferSize);
    if (options.compressionLevel !== undefined) {
      this.setCompressionLevel(options.compressionLevel);
    }
    if (options.maxServerWindowBits !== undefined) {
      this.setMaxServerWindowBits(options.maxServerWindowBits);
    }
    if (options.maxClientWindowBits !== undefined) {
      this.setMaxClientWindowBits(options.maxClientWindowBits);
    }
  }

  /** Window bits this side compresses with */
  get ourMaxWindowBits(): number {
    return this.ourWindowBits;
  }

  /** Window bits the peer compresses with */
  get theirMaxWindowBits(): number {
    return this.theirWindowBits;
  }

  /** Compression history is reset before every outgoing message */
  get noOurContextTakeover(): boolean {
    return this.noOurTakeover;
  }

  /** Decompression window is reset before every incoming message */
  get noTheirContextTakeover(): boolean {
    return this.noTheirTakeover;
  }

  /** A compressed message has started and its last fragment is pending */
  get awaitingLastFragment(): boolean {
    return this.awaitLastFragment;
  }

  /**
   * Set the server's max. window bits.
   *
   * Client mode only; the value must be within 9..=15. The server accepts
   * by answering with the same or a smaller `server_max_window_bits`.
   */
  setMaxServerWindowBits(bits: number): void {
    this.assertClientMode("setting max. server window bits");
    assertWindowBits("max. server window bits", bits);
    this.theirWindowBits = bits; // upper bound of the server's window
    this.upsertParam(SERVER_MAX_WINDOW_BITS, String(bits));
  }

  /**
   * Set the client's max. window bits.
   *
   * Client mode only; the value must be within 9..=15. The client never
   * compresses with a larger window, whatever the server answers; the
   * server may only reduce it further.
   */
  setMaxClientWindowBits(bits: number): void {
    this.assertClientMode("setting max. client window bits");
    assertWindowBits("max. client window bits", bits);
    this.ourWindowBits = bits; // upper bound of the client's window
    this.upsertParam(CLIENT_MAX_WINDOW_BITS, String(bits));
  }

  /**
   * Messages decompressing to more than `size` bytes fail to decode.
   */
  setMaxBufferSize(size: number): void {
    assertPositiveInteger("max. buffer size", size);
    this.maxBufferSize = size;
  }

  setGrowBufferSize(size: number): void {
    assertPositiveInteger("grow buffer size", size);
    this.growBufferSize = size;
  }

  /**
   * zlib compression level from 0 (no compression) to 9 (best compression).
   */
  setCompressionLevel(level: number): void {
    if (!Number.isInteger(level) || level < 0 || level > 9) {
      throw new Error(`invalid compression level: ${level}`);
    }
    this.compressionLevel = level;
    if (this.engines) {
      this.engines.encoder.close();
      this.engines.encoder = this.createEncoder();
    }
  }

  name(): string {
    return PERMESSAGE_DEFLATE;
  }

  isEnabled(): boolean {
    return this.engines !== null;
  }

  params(): readonly Param[] {
    return this.offer;
  }

  reservedBits(): ReservedBits {
    return [true, false, false];
  }

  reservedOpcode(): ReservedOpCode | undefined {
    return undefined;
  }

  configure(params: readonly Param[]): void {
    const negotiated =
      this.mode === "server" ? this.configureServer(params) : this.configureClient(params);
    // A refused offer leaves the current state (and engines) untouched
    if (!negotiated) return;

    this.ourWindowBits = negotiated.ourWindowBits;
    this.theirWindowBits = negotiated.theirWindowBits;
    this.noOurTakeover = negotiated.noOurTakeover;
    this.noTheirTakeover = negotiated.noTheirTakeover;
    if (negotiated.response !== this.offer) {
      this.offer.splice(0, this.offer.length, ...negotiated.response);
    }
    this.awaitLastFragment = false;

    this.engines?.encoder.close();
    this.engines?.decoder.close();
    this.engines = {
      encoder: this.createEncoder(),
      decoder: new InflateEngine({ windowBits: this.theirWindowBits }),
    };
    this.logger?.debug?.(
      `${PERMESSAGE_DEFLATE}: enabled`,
      `our window bits: ${this.ourWindowBits}, their window bits: ${this.theirWindowBits}`,
      `no our context takeover: ${this.noOurTakeover}`,
      `no their context takeover: ${this.noTheirTakeover}`,
    );
  }

  decode(frame: Frame): void {
    const engines = this.engines;
    // Empty frames are ignored entirely; a pending compressed message stays pending
    if (!engines || frame.payload.length === 0) return;

    const header = frame.header;
    const isDataFrame = header.opcode === OpCode.Text || header.opcode === OpCode.Binary;
    if (isDataFrame && header.rsv1) {
      if (!header.fin) {
        this.awaitLastFragment = true;
        this.logger?.trace?.(`deflate: not decoding ${formatHeader(header)}; awaiting last fragment`);
        return;
      }
    } else if (header.opcode === OpCode.Continue && header.fin && this.awaitLastFragment) {
      this.awaitLastFragment = false;
    } else {
      this.logger?.trace?.(`deflate: not decoding ${formatHeader(header)}`);
      return;
    }
    this.logger?.trace?.(`deflate: decoding ${formatHeader(header)}`);

    const decoder = engines.decoder;
    if (this.noTheirTakeover) {
      decoder.reset();
    }

    const buffer = this.buffer;
    buffer.clear();

    // Restore the stripped empty block (RFC 7692, 7.2.2)
    let status = this.inflateChunk(decoder, frame.payload);
    if (status !== "stream-end") {
      status = this.inflateChunk(decoder, TRAILER);
    }
    if (status === "stream-end") {
      // A final block ends the stream; the next message starts a new one
      decoder.reset();
    }

    frame.payload = buffer.take();
    header.rsv1 = false;
    header.payloadLength = frame.payload.length;
  }

  encode(frame: Frame): void {
    const engines = this.engines;
    if (!engines || frame.payload.length === 0) return;

    const header = frame.header;
    if (header.opcode !== OpCode.Text && header.opcode !== OpCode.Binary) {
      this.logger?.trace?.(`deflate: not encoding ${formatHeader(header)}`);
      return;
    }
    this.logger?.trace?.(`deflate: encoding ${formatHeader(header)}`);

    const encoder = engines.encoder;
    const payload = frame.payload;
    const buffer = this.buffer;
    buffer.clear();
    buffer.reserve(payload.length);

    if (this.noOurTakeover) {
      encoder.reset();
    }

    // Compress all input bytes.
    const start = encoder.totalIn;
    let consumed = 0;
    while (consumed < payload.length) {
      const status = encoder.compress(payload.subarray(consumed), buffer, "none");
      const advanced = encoder.totalIn - start;
      if (status === "buffer-full") {
        buffer.reserve(this.growBufferSize);
      } else if (status === "stream-end") {
        break;
      } else if (advanced === consumed) {
        throw new CodecInvariantError("compressor stopped consuming input");
      }
      consumed = advanced;
    }

    // Flush to a byte boundary, which appends an empty stored block (RFC 7692, 7.2.1)
    let status: CodecStatus;
    do {
      buffer.reserve(this.growBufferSize);
      status = encoder.compress(EMPTY, buffer, "sync");
    } while (status === "buffer-full");

    if (!buffer.endsWith(TRAILER)) {
      throw new CodecInvariantError("compressed message does not end with 00 00 FF FF");
    }
    buffer.truncate(buffer.length - TRAILER.length); // cf. RFC 7692, 7.2.1

    frame.payload = buffer.take();
    header.rsv1 = true;
    header.payloadLength = frame.payload.length;
  }

  /**
   * Release the codec state. The extension must not be used afterwards.
   */
  close(): void {
    this.engines?.encoder.close();
    this.engines?.decoder.close();
  }

  /**
   * Decompress one input chunk into the scratch buffer.
   *
   * Each call may write at most one byte more than the configured limit
   * allows in total, so a message of exactly `maxBufferSize` bytes fits
   * and anything larger is detected without unbounded growth.
   */
  private inflateChunk(decoder: InflateEngine, input: Uint8Array): CodecStatus {
    const buffer = this.buffer;
    const start = decoder.totalIn;
    let consumed = 0;
    for (;;) {
      if (buffer.length > this.maxBufferSize) {
        throw new BufferLimitExceededError(this.maxBufferSize);
      }
      const room = Math.min(this.growBufferSize, this.maxBufferSize + 1 - buffer.length);
      buffer.reserve(room);
      const status = decoder.decompress(input.subarray(consumed), buffer, "sync", room);
      consumed = decoder.totalIn - start;
      if (status !== "buffer-full") return status;
    }
  }

  private configureServer(params: readonly Param[]): Negotiated | undefined {
    // Every request is negotiated from scratch
    const result: Negotiated = {
      ourWindowBits: MAX_WINDOW_BITS,
      theirWindowBits: MAX_WINDOW_BITS,
      noOurTakeover: false,
      noTheirTakeover: false,
      response: [],
    };

    for (const p of params) {
      this.logger?.trace?.(`configure server with: ${p}`);
      switch (p.name) {
        case CLIENT_MAX_WINDOW_BITS: {
          // On failure we just accept the client's offer as is => no need to reply
          const bits = this.acceptTheirWindowBits(p, result.theirWindowBits);
          if (bits === undefined) return undefined;
          result.theirWindowBits = bits;
          break;
        }
        case SERVER_MAX_WINDOW_BITS: {
          const bits = parseWindowBits(p.value);
          // The RFC allows 8 to 15 bits, but the codec only supports 9 to 15.
          if (bits === undefined || bits < MIN_WINDOW_BITS || bits > MAX_WINDOW_BITS) {
            this.logger?.debug?.(`unacceptable ${SERVER_MAX_WINDOW_BITS}: ${p.value}`);
            return undefined;
          }
          result.response.push(new Param(SERVER_MAX_WINDOW_BITS, String(bits)));
          result.ourWindowBits = bits;
          break;
        }
        case CLIENT_NO_CONTEXT_TAKEOVER:
          result.response.push(new Param(CLIENT_NO_CONTEXT_TAKEOVER));
          result.noTheirTakeover = true;
          break;
        case SERVER_NO_CONTEXT_TAKEOVER:
          result.response.push(new Param(SERVER_NO_CONTEXT_TAKEOVER));
          result.noOurTakeover = true;
          break;
        default:
          this.logger?.debug?.(`${PERMESSAGE_DEFLATE}: unknown parameter: ${p.name}`);
          return undefined;
      }
    }
    return result;
  }

  private configureClient(params: readonly Param[]): Negotiated | undefined {
    // Window bits set by the setters are upper bounds for the answer
    const result: Negotiated = {
      ourWindowBits: this.ourWindowBits,
      theirWindowBits: this.theirWindowBits,
      noOurTakeover: false,
      noTheirTakeover: false,
      response: this.offer,
    };

    for (const p of params) {
      this.logger?.trace?.(`configure client with: ${p}`);
      switch (p.name) {
        case SERVER_NO_CONTEXT_TAKEOVER:
          result.noTheirTakeover = true;
          break;
        case CLIENT_NO_CONTEXT_TAKEOVER:
          result.noOurTakeover = true;
          break;
        case SERVER_MAX_WINDOW_BITS: {
          if (p.value === undefined) {
            this.logger?.debug?.(`${SERVER_MAX_WINDOW_BITS} without value`);
            return undefined;
          }
          const bits = this.acceptTheirWindowBits(p, result.theirWindowBits, this.theirWindowBits);
          if (bits === undefined) return undefined;
          result.theirWindowBits = bits;
          break;
        }
        case CLIENT_MAX_WINDOW_BITS: {
          if (p.value === undefined) break;
          const bits = parseWindowBits(p.value);
          if (bits === undefined || bits < MIN_NEGOTIABLE_WINDOW_BITS || bits > MAX_WINDOW_BITS) {
            this.logger?.debug?.(`unacceptable ${CLIENT_MAX_WINDOW_BITS}: ${p.value}`);
            return undefined;
          }
          // The server may shrink our window, never grow it.
          result.ourWindowBits = Math.min(result.ourWindowBits, Math.max(MIN_WINDOW_BITS, bits));
          break;
        }
        default:
          this.logger?.debug?.(`${PERMESSAGE_DEFLATE}: unknown parameter: ${p.name}`);
          return undefined;
      }
    }
    return result;
  }

  /**
   * Window bits of the peer taken from `p`, raised to at least 9, or
   * undefined if the value is unacceptable. A parameter without value
   * keeps `current`.
   *
   * @param upperBound Largest acceptable value (the window we offered)
   */
  private acceptTheirWindowBits(p: Param, current: number, upperBound?: number): number | undefined {
    if (p.value === undefined) return current;
    const bits = parseWindowBits(p.value);
    if (bits === undefined || bits < MIN_NEGOTIABLE_WINDOW_BITS || bits > MAX_WINDOW_BITS) {
      this.logger?.debug?.(
        `invalid ${p.name}: ${p.value} (expected range: ${MIN_NEGOTIABLE_WINDOW_BITS} ..= ${MAX_WINDOW_BITS})`,
      );
      return undefined;
    }
    if (upperBound !== undefined && bits > upperBound) {
      this.logger?.debug?.(`invalid ${p.name}: ${bits} (expected: ${bits} <= ${upperBound})`);
      return undefined;
    }
    return Math.max(MIN_WINDOW_BITS, bits);
  }

  private createEncoder(): DeflateEngine {
    return new DeflateEngine({ level: this.compressionLevel, windowBits: this.ourWindowBits });
  }

  private upsertParam(name: string, value: string): void {
    const existing = this.offer.find((p) => p.name === name);
    if (existing) {
      existing.setValue(value);
    } else {
      this.offer.push(new Param(name, value));
    }
  }

  private assertClientMode(action: string): void {
    if (this.mode !== "client") {
      throw new Error(`${action} requires client mode`);
    }
  }
}

/**
 * Parse an unsigned decimal window-bits value.
 */
function parseWindowBits(value: string | undefined): number | undefined {
  if (value === undefined || !/^[0-9]{1,3}$/.test(value)) return undefined;
  return Number(value);
}

function assertWindowBits(what: string, bits: number): void {
  if (!Number.isInteger(bits) || bits < MIN_WINDOW_BITS || bits > MAX_WINDOW_BITS) {
    throw new Error(`${what} have to be within ${MIN_WINDOW_BITS} ..= ${MAX_WINDOW_BITS}`);
  }
}

function assertPositiveInteger(what: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${what} must be a positive integer: ${value}`);
  }
}
