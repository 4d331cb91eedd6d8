/**
 * Owning wrapper that forwards the whole Extension contract.
 *
 * Lets heterogeneous extensions live in one collection while callers
 * still reach the concrete instance through `inner`.
 */

import type { Frame, ReservedOpCode } from "../frame/types.js";
import type { Param } from "./param.js";
import type { Extension, ReservedBits } from "./types.js";

export class BoxedExtension<E extends Extension = Extension> implements Extension {
  constructor(readonly inner: E) {}

  isEnabled(): boolean {
    return this.inner.isEnabled();
  }

  name(): string {
    return this.inner.name();
  }

  params(): readonly Param[] {
    return this.inner.params();
  }

  configure(params: readonly Param[]): void {
    this.inner.configure(params);
  }

  encode(frame: Frame): void {
    this.inner.encode(frame);
  }

  decode(frame: Frame): void {
    this.inner.decode(frame);
  }

  reservedBits(): ReservedBits {
    return this.inner.reservedBits();
  }

  reservedOpcode(): ReservedOpCode | undefined {
    return this.inner.reservedOpcode();
  }
}

/**
 * Wrap extensions into a uniform list.
 */
export function boxExtensions(...extensions: Extension[]): BoxedExtension[] {
  return extensions.map((extension) =>
    extension instanceof BoxedExtension ? extension : new BoxedExtension(extension),
  );
}
