/**
 * Access control policies for values of handshake headers such as Host
 * and Origin.
 */

export interface Policy {
  /** Check if a given value is allowed to handshake with us */
  isAllowed(value: string): boolean;
}

/**
 * Allow any value.
 */
export const allowAny: Policy = {
  isAllowed: () => true,
};

/**
 * Allow only values from the list (exact match).
 */
export class AllowList implements Policy {
  private readonly allowed: ReadonlySet<string>;

  constructor(list: Iterable<string>) {
    this.allowed = new Set(list);
  }

  isAllowed(value: string): boolean {
    return this.allowed.has(value);
  }
}
