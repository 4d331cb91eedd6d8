/**
 * WebSocket extension contract (RFC 6455, section 9).
 *
 * Extensions take part in the opening handshake and afterwards in frame
 * encoding and decoding. The handshake differs per side:
 *
 * Server
 * 1. All extensions start disabled but available.
 * 2. For each extension whose name matches an offer in the client's
 *    request, `configure` is called with the offered parameters. The
 *    extension may enable itself.
 * 3. Every extension whose `isEnabled()` returns true contributes its
 *    name and `params()` to the response.
 *
 * Client
 * 1. All extensions start disabled but available.
 * 2. Every extension contributes its name and `params()` to the request.
 * 3. For each extension named in the server's response, `configure` is
 *    called with the response parameters. The extension may enable
 *    itself.
 *
 * Enabled extensions then process every frame: `encode` right before a
 * frame is written, `decode` right after it was read. Both mutate the
 * frame in place. After a thrown error the frame is in an unspecified
 * state and must be discarded together with the connection.
 */

import type { Frame, ReservedOpCode } from "../frame/types.js";
import type { Param } from "./param.js";

/**
 * Connection side an extension instance works for.
 */
export type Mode = "client" | "server";

/**
 * Claim on the RSV1, RSV2 and RSV3 header bits.
 */
export type ReservedBits = readonly [rsv1: boolean, rsv2: boolean, rsv3: boolean];

export const NO_RESERVED_BITS: ReservedBits = [false, false, false];

/**
 * Optional logger for debugging.
 */
export interface ExtensionLogger {
  trace?: (...args: unknown[]) => void;
  debug?: (...args: unknown[]) => void;
  error?: (...args: unknown[]) => void;
}

export interface Extension {
  /** True once negotiation succeeded */
  isEnabled(): boolean;

  /** Token identifying the extension in the negotiation header */
  name(): string;

  /** Parameters to send: the offer (client) or acknowledgement (server) */
  params(): readonly Param[];

  /**
   * Apply parameters received from the peer.
   *
   * Unacceptable parameters are not errors: the extension simply stays
   * disabled. Throwing is reserved for failures of the extension itself.
   */
  configure(params: readonly Param[]): void;

  /** Transform an outgoing frame */
  encode(frame: Frame): void;

  /** Transform an incoming frame */
  decode(frame: Frame): void;

  /** Reserved header bits this extension uses */
  reservedBits(): ReservedBits;

  /** Reserved opcode this extension uses, if any */
  reservedOpcode(): ReservedOpCode | undefined;
}
