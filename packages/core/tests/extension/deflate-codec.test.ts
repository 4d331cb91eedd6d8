import { CompressionError } from "@ws-ext/utils/compression";
import { describe, expect, it } from "vitest";
import { BufferLimitExceededError } from "../../src/extension/errors.js";
import { DeflateExtension } from "../../src/extension/deflate/index.js";
import { Param } from "../../src/extension/param.js";
import { createFrame, OpCode } from "../../src/frame/types.js";
import { negotiatedPair, textFrame } from "../helpers/extensions.js";

const decoder = new TextDecoder();

/** "Hello" compressed with an empty dictionary, trailer stripped */
const HELLO = [0xf2, 0x48, 0xcd, 0xc9, 0xc9, 0x07, 0x00];

function longText(lines: number): string {
  const parts: string[] = [];
  for (let i = 0; i < lines; i++) {
    parts.push(`line ${i}: the quick brown fox jumps over the lazy dog`);
  }
  return parts.join("\n");
}

describe("DeflateExtension encode/decode", () => {
  it("should compress a text message and flag it with RSV1", () => {
    const { client } = negotiatedPair();
    const frame = textFrame("Hello");

    client.encode(frame);

    expect(Array.from(frame.payload)).toEqual(HELLO);
    expect(frame.header.rsv1).toBe(true);
    expect(frame.header.payloadLength).toBe(7);
    expect(frame.header.fin).toBe(true);
    expect(frame.header.opcode).toBe(OpCode.Text);
  });

  it("should decompress a compressed message and clear RSV1", () => {
    const { server } = negotiatedPair();
    const frame = createFrame(OpCode.Text, new Uint8Array(HELLO), { rsv1: true });

    server.decode(frame);

    expect(decoder.decode(frame.payload)).toBe("Hello");
    expect(frame.header.rsv1).toBe(false);
    expect(frame.header.payloadLength).toBe(5);
  });

  it("should round-trip messages in both directions", () => {
    const { client, server } = negotiatedPair();
    const text = longText(100);

    const outgoing = textFrame(text);
    client.encode(outgoing);
    expect(outgoing.payload.length).toBeLessThan(text.length);
    server.decode(outgoing);
    expect(decoder.decode(outgoing.payload)).toBe(text);

    const incoming = createFrame(OpCode.Binary, new TextEncoder().encode(text));
    server.encode(incoming);
    expect(incoming.header.rsv1).toBe(true);
    client.decode(incoming);
    expect(decoder.decode(incoming.payload)).toBe(text);
    expect(incoming.header.opcode).toBe(OpCode.Binary);
  });

  it("should decompress in steps of the grow buffer size", () => {
    const { client, server } = negotiatedPair(undefined, {}, { growBufferSize: 64 });
    const text = longText(50);
    const frame = textFrame(text);

    client.encode(frame);
    server.decode(frame);

    expect(decoder.decode(frame.payload)).toBe(text);
    expect(frame.header.payloadLength).toBe(text.length);
  });

  it("should compress with the negotiated level", () => {
    const { client, server } = negotiatedPair(undefined, { compressionLevel: 9 });
    const text = longText(20);
    const frame = textFrame(text);

    client.encode(frame);
    server.decode(frame);

    expect(decoder.decode(frame.payload)).toBe(text);
  });

  it("should compress without compression at level 0", () => {
    const { client, server } = negotiatedPair();
    client.setCompressionLevel(0);
    const text = longText(5);
    const frame = textFrame(text);

    client.encode(frame);
    expect(frame.payload.length).toBeGreaterThan(text.length);
    server.decode(frame);

    expect(decoder.decode(frame.payload)).toBe(text);
  });
});

describe("DeflateExtension frame selection", () => {
  it("should leave frames untouched while disabled", () => {
    const extension = new DeflateExtension("server");
    const frame = textFrame("Hello");
    const payload = frame.payload;

    extension.encode(frame);
    extension.decode(frame);

    expect(frame.payload).toBe(payload);
    expect(frame.header.rsv1).toBe(false);
  });

  it("should not encode control frames", () => {
    const { client } = negotiatedPair();
    const frame = createFrame(OpCode.Ping, new Uint8Array([1, 2, 3]));

    client.encode(frame);

    expect(Array.from(frame.payload)).toEqual([1, 2, 3]);
    expect(frame.header.rsv1).toBe(false);
  });

  it("should not touch empty payloads", () => {
    const { client, server } = negotiatedPair();
    const outgoing = textFrame("");
    const incoming = createFrame(OpCode.Text, new Uint8Array(0), { rsv1: true });

    client.encode(outgoing);
    server.decode(incoming);

    expect(outgoing.header.rsv1).toBe(false);
    expect(incoming.header.rsv1).toBe(true);
    expect(incoming.payload.length).toBe(0);
  });

  it("should pass uncompressed messages through", () => {
    const { server } = negotiatedPair();
    const frame = textFrame("plain");

    server.decode(frame);

    expect(decoder.decode(frame.payload)).toBe("plain");
  });

  it("should pass a final continuation frame through when nothing is pending", () => {
    const { server } = negotiatedPair();
    const frame = createFrame(OpCode.Continue, new Uint8Array(HELLO));

    server.decode(frame);

    expect(Array.from(frame.payload)).toEqual(HELLO);
  });

  it("should decode a compressed message on its last fragment", () => {
    const { server } = negotiatedPair();
    const first = createFrame(OpCode.Text, new Uint8Array(HELLO), { fin: false, rsv1: true });

    server.decode(first);

    expect(Array.from(first.payload)).toEqual(HELLO);
    expect(first.header.rsv1).toBe(true);
    expect(server.awaitingLastFragment).toBe(true);

    const last = createFrame(OpCode.Continue, new Uint8Array(HELLO));
    server.decode(last);

    expect(decoder.decode(last.payload)).toBe("Hello");
    expect(server.awaitingLastFragment).toBe(false);
  });

  it("should keep waiting for the last fragment across empty frames", () => {
    const { server } = negotiatedPair();
    server.decode(createFrame(OpCode.Text, new Uint8Array(HELLO), { fin: false, rsv1: true }));

    const empty = createFrame(OpCode.Continue, new Uint8Array(0));
    server.decode(empty);

    expect(empty.payload.length).toBe(0);
    expect(server.awaitingLastFragment).toBe(true);

    const last = createFrame(OpCode.Continue, new Uint8Array(HELLO));
    server.decode(last);
    expect(decoder.decode(last.payload)).toBe("Hello");
    expect(server.awaitingLastFragment).toBe(false);
  });
});

describe("DeflateExtension codec errors", () => {
  it("should propagate decompression errors unchanged", () => {
    const { server } = negotiatedPair();
    const payload = new Uint8Array([0xff, 0xff, 0xff]);
    const frame = createFrame(OpCode.Binary, payload, { rsv1: true });

    expect(() => server.decode(frame)).toThrow(CompressionError);
    expect(frame.payload).toBe(payload);
    expect(frame.header.rsv1).toBe(true);
  });
});

describe("DeflateExtension buffer limit", () => {
  it("should accept a message of exactly the max. buffer size", () => {
    const { client, server } = negotiatedPair(undefined, {}, { maxBufferSize: 16 });
    const frame = textFrame("0123456789abcdef");

    client.encode(frame);
    server.decode(frame);

    expect(decoder.decode(frame.payload)).toBe("0123456789abcdef");
  });

  it("should reject a message larger than the max. buffer size", () => {
    const { client, server } = negotiatedPair(undefined, {}, { maxBufferSize: 16 });
    const frame = textFrame("0123456789abcdefg");
    client.encode(frame);
    const compressed = frame.payload;

    expect(() => server.decode(frame)).toThrow(BufferLimitExceededError);
    expect(frame.payload).toBe(compressed);
    expect(frame.header.rsv1).toBe(true);
  });

  it("should report the limit", () => {
    const { client, server } = negotiatedPair(undefined, {}, { maxBufferSize: 100 });
    const frame = textFrame(longText(10));
    client.encode(frame);

    expect(() => server.decode(frame)).toThrow(
      "decompressed message too large (limit: 100 bytes)",
    );
  });
});

describe("DeflateExtension context takeover", () => {
  it("should compress every message alike without context takeover", () => {
    const { client } = negotiatedPair();
    const first = textFrame("Hello");
    const second = textFrame("Hello");

    client.encode(first);
    client.encode(second);

    expect(Array.from(second.payload)).toEqual(HELLO);
    expect(second.payload).toEqual(first.payload);
  });

  it("should reuse the window across messages with context takeover", () => {
    const { client, server } = negotiatedPair([]);
    expect(client.noOurContextTakeover).toBe(false);
    expect(server.noTheirContextTakeover).toBe(false);

    const first = textFrame("Hello");
    const second = textFrame("Hello");
    client.encode(first);
    client.encode(second);

    expect(Array.from(first.payload)).toEqual(HELLO);
    expect(second.payload.length).toBeLessThan(first.payload.length);

    server.decode(first);
    server.decode(second);
    expect(decoder.decode(first.payload)).toBe("Hello");
    expect(decoder.decode(second.payload)).toBe("Hello");
  });
});

describe("DeflateExtension window bits", () => {
  it("should round-trip with 9 window bits on both sides", () => {
    const { client, server } = negotiatedPair(undefined, {
      maxClientWindowBits: 9,
      maxServerWindowBits: 9,
    });
    expect(client.isEnabled()).toBe(true);
    expect(client.ourMaxWindowBits).toBe(9);
    expect(client.theirMaxWindowBits).toBe(9);
    expect(server.ourMaxWindowBits).toBe(9);
    expect(server.theirMaxWindowBits).toBe(9);

    const text = longText(40);
    const outgoing = textFrame(text);
    client.encode(outgoing);
    server.decode(outgoing);
    expect(decoder.decode(outgoing.payload)).toBe(text);

    const incoming = textFrame(text);
    server.encode(incoming);
    client.decode(incoming);
    expect(decoder.decode(incoming.payload)).toBe(text);
  });

  it("should compress with the window the client asked for", () => {
    const { client, server } = negotiatedPair([new Param("server_max_window_bits", "10")]);
    expect(server.ourMaxWindowBits).toBe(10);
    expect(client.theirMaxWindowBits).toBe(10);

    const text = longText(40);
    const frame = textFrame(text);
    server.encode(frame);
    client.decode(frame);
    expect(decoder.decode(frame.payload)).toBe(text);
  });
});

describe("DeflateExtension close", () => {
  it("should refuse to encode after close", () => {
    const { client } = negotiatedPair();
    client.close();

    expect(() => client.encode(textFrame("Hello"))).toThrow("deflate engine is closed");
  });
});
