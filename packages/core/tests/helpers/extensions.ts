import { DeflateExtension, type DeflateOptions } from "../../src/extension/deflate/index.js";
import { Param } from "../../src/extension/param.js";
import type { Extension, ReservedBits } from "../../src/extension/types.js";
import { createFrame, type Frame, OpCode, type ReservedOpCode } from "../../src/frame/types.js";

const encoder = new TextEncoder();

export function textFrame(text: string, fin = true): Frame {
  return createFrame(OpCode.Text, encoder.encode(text), { fin });
}

/**
 * Client and server deflate extensions negotiated with each other.
 *
 * @param offer Parameters the client offers; defaults to the client's own offer
 */
export function negotiatedPair(
  offer?: Param[],
  clientOptions: DeflateOptions = {},
  serverOptions: DeflateOptions = {},
): { client: DeflateExtension; server: DeflateExtension } {
  const client = new DeflateExtension("client", clientOptions);
  const server = new DeflateExtension("server", serverOptions);
  server.configure(offer ?? client.params());
  client.configure(server.params());
  return { client, server };
}

/**
 * Extension that records every call it receives.
 */
export class RecordingExtension implements Extension {
  readonly calls: string[] = [];
  private enabled = false;

  constructor(
    private readonly extensionName: string,
    private readonly bits: ReservedBits = [false, false, false],
    private readonly opcode?: ReservedOpCode,
    private readonly offer: Param[] = [new Param("x_param", "1")],
  ) {}

  isEnabled(): boolean {
    this.calls.push("isEnabled");
    return this.enabled;
  }

  name(): string {
    return this.extensionName;
  }

  params(): readonly Param[] {
    this.calls.push("params");
    return this.offer;
  }

  configure(params: readonly Param[]): void {
    this.calls.push(`configure(${params.join(";")})`);
    this.enabled = true;
  }

  encode(frame: Frame): void {
    this.calls.push("encode");
    frame.header.rsv3 = true;
  }

  decode(frame: Frame): void {
    this.calls.push("decode");
    frame.header.rsv3 = false;
  }

  reservedBits(): ReservedBits {
    this.calls.push("reservedBits");
    return this.bits;
  }

  reservedOpcode(): ReservedOpCode | undefined {
    this.calls.push("reservedOpcode");
    return this.opcode;
  }
}
