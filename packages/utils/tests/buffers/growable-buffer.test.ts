import { describe, expect, it } from "vitest";
import { GrowableBuffer } from "../../src/buffers/growable-buffer.js";

describe("GrowableBuffer", () => {
  it("should start empty", () => {
    const buffer = new GrowableBuffer();
    expect(buffer.length).toBe(0);
    expect(buffer.capacity).toBe(0);
    expect(buffer.view()).toEqual(new Uint8Array(0));
  });

  it("should reserve at least the requested space", () => {
    const buffer = new GrowableBuffer(4);
    buffer.append(new Uint8Array([1, 2, 3]));
    buffer.reserve(10);
    expect(buffer.capacity).toBeGreaterThanOrEqual(13);
    expect(buffer.spare).toBe(buffer.capacity - 3);
    expect(buffer.view()).toEqual(new Uint8Array([1, 2, 3]));
  });

  it("should not reallocate when the space is already there", () => {
    const buffer = new GrowableBuffer(16);
    const before = buffer.bytes;
    buffer.reserve(16);
    expect(buffer.bytes).toBe(before);
  });

  it("should accept a length written by a codec", () => {
    const buffer = new GrowableBuffer(8);
    buffer.bytes.set([9, 8, 7], 0);
    buffer.length = 3;
    expect(buffer.view()).toEqual(new Uint8Array([9, 8, 7]));
  });

  it("should reject a length beyond the capacity", () => {
    const buffer = new GrowableBuffer(2);
    expect(() => {
      buffer.length = 3;
    }).toThrow(RangeError);
  });

  it("should match suffixes", () => {
    const buffer = new GrowableBuffer();
    buffer.append(new Uint8Array([1, 0, 0, 0xff, 0xff]));
    expect(buffer.endsWith(new Uint8Array([0, 0, 0xff, 0xff]))).toBe(true);
    expect(buffer.endsWith(new Uint8Array([1, 0, 0xff, 0xff]))).toBe(false);
    expect(buffer.endsWith(new Uint8Array(6))).toBe(false);
  });

  it("should truncate but never extend", () => {
    const buffer = new GrowableBuffer();
    buffer.append(new Uint8Array([1, 2, 3, 4]));
    buffer.truncate(2);
    expect(buffer.view()).toEqual(new Uint8Array([1, 2]));
    buffer.truncate(10);
    expect(buffer.length).toBe(2);
  });

  it("should hand over the storage when mostly full", () => {
    const buffer = new GrowableBuffer(4);
    buffer.append(new Uint8Array([1, 2, 3]));
    const storage = buffer.bytes;

    const content = buffer.take();

    expect(content).toEqual(new Uint8Array([1, 2, 3]));
    expect(content.buffer).toBe(storage.buffer);
    expect(buffer.length).toBe(0);
    expect(buffer.capacity).toBe(0);
  });

  it("should copy out and keep the storage when mostly empty", () => {
    const buffer = new GrowableBuffer(64);
    buffer.append(new Uint8Array([5, 6]));
    const storage = buffer.bytes;

    const content = buffer.take();

    expect(content).toEqual(new Uint8Array([5, 6]));
    expect(content.buffer).not.toBe(storage.buffer);
    expect(buffer.bytes).toBe(storage);
    expect(buffer.length).toBe(0);
  });
});
