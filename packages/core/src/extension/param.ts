/**
 * Extension parameter exchanged during handshake negotiation.
 *
 * A parameter is a name with an optional value, e.g.
 * `client_max_window_bits` or `server_max_window_bits=10`. The same type
 * is used for offers an extension sends and for parameters a peer
 * returns. No validation happens here; extensions interpret the values.
 */
export class Param {
  readonly name: string;
  private current: string | undefined;

  constructor(name: string, value?: string) {
    this.name = name;
    this.current = value;
  }

  get value(): string | undefined {
    return this.current;
  }

  /**
   * Replace the value (or remove it with `undefined`).
   */
  setValue(value: string | undefined): this {
    this.current = value;
    return this;
  }

  equals(other: Param): boolean {
    return this.name === other.name && this.current === other.current;
  }

  toString(): string {
    return this.current === undefined ? this.name : `${this.name}=${this.current}`;
  }
}
