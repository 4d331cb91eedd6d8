import { describe, expect, it } from "vitest";
import { BoxedExtension, boxExtensions } from "../../src/extension/boxed-extension.js";
import { DeflateExtension } from "../../src/extension/deflate/index.js";
import { Param } from "../../src/extension/param.js";
import { createFrame, OpCode } from "../../src/frame/types.js";
import { RecordingExtension } from "../helpers/extensions.js";

describe("BoxedExtension", () => {
  it("should forward every operation to the wrapped extension", () => {
    const inner = new RecordingExtension("x-test", [false, true, false], 0x3);
    const boxed = new BoxedExtension(inner);
    const frame = createFrame(OpCode.Binary, new Uint8Array([1]));

    expect(boxed.name()).toBe("x-test");
    expect(boxed.isEnabled()).toBe(false);
    expect(boxed.params()).toEqual([new Param("x_param", "1")]);
    boxed.configure([new Param("a"), new Param("b", "2")]);
    expect(boxed.isEnabled()).toBe(true);
    boxed.encode(frame);
    expect(frame.header.rsv3).toBe(true);
    boxed.decode(frame);
    expect(frame.header.rsv3).toBe(false);
    expect(boxed.reservedBits()).toEqual([false, true, false]);
    expect(boxed.reservedOpcode()).toBe(0x3);

    expect(inner.calls).toEqual([
      "isEnabled",
      "params",
      "configure(a;b=2)",
      "isEnabled",
      "encode",
      "decode",
      "reservedBits",
      "reservedOpcode",
    ]);
  });

  it("should keep the concrete extension reachable", () => {
    const deflate = new DeflateExtension("client");
    const boxed = new BoxedExtension(deflate);

    expect(boxed.inner).toBe(deflate);
    expect(boxed.name()).toBe("permessage-deflate");
    expect(boxed.reservedBits()).toEqual([true, false, false]);
    expect(boxed.reservedOpcode()).toBeUndefined();
  });

  it("should not wrap twice", () => {
    const deflate = new DeflateExtension("server");
    const once = new BoxedExtension(deflate);
    const [a, b] = boxExtensions(once, new RecordingExtension("x-test"));

    expect(a).toBe(once);
    expect(b).toBeInstanceOf(BoxedExtension);
    expect(b.name()).toBe("x-test");
  });
});
