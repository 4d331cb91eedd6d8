/**
 * WebSocket frame model (RFC 6455, section 5.2).
 *
 * Only the parts extensions read and mutate are modelled here: the
 * header bits, the opcode, the payload length and the payload itself.
 * Byte-level framing (masking, extended length fields) belongs to the
 * frame codec of the owning connection.
 */

/**
 * Frame opcodes.
 */
export const OpCode = {
  Continue: 0x0,
  Text: 0x1,
  Binary: 0x2,
  Close: 0x8,
  Ping: 0x9,
  Pong: 0xa,
} as const;

export type DataOpCode = (typeof OpCode)["Continue" | "Text" | "Binary"];
export type ControlOpCode = (typeof OpCode)["Close" | "Ping" | "Pong"];

/**
 * Opcodes RFC 6455 leaves for extensions (0x3-0x7 data, 0xB-0xF control).
 */
export type ReservedOpCode = 0x3 | 0x4 | 0x5 | 0x6 | 0x7 | 0xb | 0xc | 0xd | 0xe | 0xf;

export type FrameOpCode = DataOpCode | ControlOpCode | ReservedOpCode;

/**
 * Mutable frame header.
 */
export interface FrameHeader {
  /** Final fragment of a message */
  fin: boolean;
  rsv1: boolean;
  rsv2: boolean;
  rsv3: boolean;
  opcode: FrameOpCode;
  /** Length of the payload as it goes on (or came off) the wire */
  payloadLength: number;
}

/**
 * A frame handed to extensions for encoding or decoding.
 */
export interface Frame {
  header: FrameHeader;
  payload: Uint8Array;
}

export interface CreateFrameOptions {
  fin?: boolean;
  rsv1?: boolean;
  rsv2?: boolean;
  rsv3?: boolean;
}

/**
 * Create a frame whose payload length matches its payload.
 */
export function createFrame(
  opcode: FrameOpCode,
  payload: Uint8Array,
  options: CreateFrameOptions = {},
): Frame {
  return {
    header: {
      fin: options.fin ?? true,
      rsv1: options.rsv1 ?? false,
      rsv2: options.rsv2 ?? false,
      rsv3: options.rsv3 ?? false,
      opcode,
      payloadLength: payload.length,
    },
    payload,
  };
}

export function isControlOpCode(opcode: number): boolean {
  return (opcode & 0x8) !== 0;
}

export function isReservedOpCode(opcode: number): opcode is ReservedOpCode {
  return (opcode >= 0x3 && opcode <= 0x7) || (opcode >= 0xb && opcode <= 0xf);
}

const OPCODE_NAMES: Partial<Record<number, string>> = {
  [OpCode.Continue]: "continue",
  [OpCode.Text]: "text",
  [OpCode.Binary]: "binary",
  [OpCode.Close]: "close",
  [OpCode.Ping]: "ping",
  [OpCode.Pong]: "pong",
};

/**
 * Compact one-line description of a header for log output.
 *
 * Example: `fin=1 rsv=100 op=text len=5`
 */
export function formatHeader(header: FrameHeader): string {
  const rsv = `${header.rsv1 ? 1 : 0}${header.rsv2 ? 1 : 0}${header.rsv3 ? 1 : 0}`;
  const op = OPCODE_NAMES[header.opcode] ?? `reserved(0x${header.opcode.toString(16)})`;
  return `fin=${header.fin ? 1 : 0} rsv=${rsv} op=${op} len=${header.payloadLength}`;
}
