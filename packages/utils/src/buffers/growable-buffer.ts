/**
 * Growable byte buffer with explicit capacity management.
 *
 * Streaming codecs write into the spare capacity (`capacity - length`)
 * and advance `length` by the number of bytes produced. The backing
 * array is reused between calls, so a long-lived scratch buffer does
 * not allocate for every message.
 */
export class GrowableBuffer {
  private storage: Uint8Array;
  private used = 0;

  constructor(initialCapacity = 0) {
    this.storage = new Uint8Array(initialCapacity);
  }

  /** Backing array; bytes past `length` are unspecified. */
  get bytes(): Uint8Array {
    return this.storage;
  }

  get length(): number {
    return this.used;
  }

  /**
   * Set the number of valid bytes. Used by codecs after writing
   * directly into `bytes`.
   */
  set length(value: number) {
    if (!Number.isInteger(value) || value < 0 || value > this.storage.length) {
      throw new RangeError(`length ${value} must be within [0, ${this.storage.length}]`);
    }
    this.used = value;
  }

  get capacity(): number {
    return this.storage.length;
  }

  /** Free space after the valid bytes */
  get spare(): number {
    return this.storage.length - this.used;
  }

  /**
   * Ensure room for at least `additional` more bytes.
   * Existing content is preserved.
   */
  reserve(additional: number): void {
    const required = this.used + additional;
    if (required <= this.storage.length) return;
    const next = new Uint8Array(Math.max(required, this.storage.length * 2));
    next.set(this.storage.subarray(0, this.used));
    this.storage = next;
  }

  clear(): void {
    this.used = 0;
  }

  truncate(length: number): void {
    if (length < this.used) {
      this.used = Math.max(0, length);
    }
  }

  append(data: Uint8Array): void {
    this.reserve(data.length);
    this.storage.set(data, this.used);
    this.used += data.length;
  }

  endsWith(suffix: Uint8Array): boolean {
    if (suffix.length > this.used) return false;
    const offset = this.used - suffix.length;
    for (let i = 0; i < suffix.length; i++) {
      if (this.storage[offset + i] !== suffix[i]) return false;
    }
    return true;
  }

  /** View of the valid bytes (shares memory with the buffer) */
  view(): Uint8Array {
    return this.storage.subarray(0, this.used);
  }

  /**
   * Hand the valid bytes over to the caller and leave the buffer empty.
   *
   * When the content fills at least half of the storage, the storage
   * itself is handed over and the buffer starts again from nothing;
   * otherwise the content is copied out and the storage kept for reuse.
   * The returned array is never written by this buffer afterwards.
   */
  take(): Uint8Array {
    let content: Uint8Array;
    if (this.used * 2 >= this.storage.length) {
      content = this.storage.subarray(0, this.used);
      this.storage = new Uint8Array(0);
    } else {
      content = this.storage.slice(0, this.used);
    }
    this.used = 0;
    return content;
  }
}
