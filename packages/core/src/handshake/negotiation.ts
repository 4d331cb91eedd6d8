/**
 * Extension negotiation during the opening handshake.
 *
 * The client offers every extension it has; the server configures the
 * extensions it recognises and answers with those that enabled
 * themselves; the client finally configures the extensions the server
 * accepted. Extensions signal the outcome only through `isEnabled()`.
 */

import type { ReservedOpCode } from "../frame/types.js";
import { NegotiationError } from "../extension/errors.js";
import type { Extension, ReservedBits } from "../extension/types.js";
import {
  type ExtensionOffer,
  formatExtensionHeader,
  parseExtensionHeader,
} from "./extension-header.js";

/**
 * Client: offers for the handshake request, one per extension,
 * regardless of enabled state.
 */
export function buildClientOffers(extensions: readonly Extension[]): ExtensionOffer[] {
  return extensions.map(toOffer);
}

/**
 * Client: configure the extensions named in the server's response.
 *
 * @throws NegotiationError if the server accepted an extension that was
 * never offered
 */
export function configureFromResponse(
  extensions: readonly Extension[],
  response: readonly ExtensionOffer[],
): void {
  for (const accepted of response) {
    const extension = extensions.find((e) => e.name() === accepted.name);
    if (!extension) {
      throw new NegotiationError(`server accepted an extension we did not offer: ${accepted.name}`);
    }
    extension.configure(accepted.params);
  }
}

/**
 * Server: configure every extension from the client's offers.
 *
 * A client may offer the same extension several times with alternative
 * parameters, in order of preference; the first acceptable one wins.
 */
export function configureFromRequest(
  extensions: readonly Extension[],
  request: readonly ExtensionOffer[],
): void {
  for (const extension of extensions) {
    for (const offer of request) {
      if (offer.name !== extension.name()) continue;
      extension.configure(offer.params);
      if (extension.isEnabled()) break;
    }
  }
}

/**
 * Server: response entries for all enabled extensions.
 */
export function buildServerResponse(extensions: readonly Extension[]): ExtensionOffer[] {
  return extensions.filter((e) => e.isEnabled()).map(toOffer);
}

/**
 * Client: Sec-WebSocket-Extensions value for the handshake request, or
 * undefined when there is nothing to offer.
 */
export function createOfferHeader(extensions: readonly Extension[]): string | undefined {
  const offers = buildClientOffers(extensions);
  return offers.length > 0 ? formatExtensionHeader(offers) : undefined;
}

/**
 * Client: apply the Sec-WebSocket-Extensions value of the response.
 */
export function acceptResponseHeader(
  extensions: readonly Extension[],
  header: string | undefined,
): void {
  if (header === undefined) return;
  configureFromResponse(extensions, parseExtensionHeader(header));
  assertNoReservedBitConflict(extensions);
}

/**
 * Server: negotiate from the request's Sec-WebSocket-Extensions value and
 * return the value for the response (undefined when nothing was enabled).
 */
export function answerOfferHeader(
  extensions: readonly Extension[],
  header: string | undefined,
): string | undefined {
  if (header === undefined) return undefined;
  configureFromRequest(extensions, parseExtensionHeader(header));
  assertNoReservedBitConflict(extensions);
  const response = buildServerResponse(extensions);
  return response.length > 0 ? formatExtensionHeader(response) : undefined;
}

/**
 * Reserved header bits claimed by the enabled extensions. Frames with
 * any other reserved bit set are protocol errors.
 */
export function claimedReservedBits(extensions: readonly Extension[]): ReservedBits {
  const claimed: [boolean, boolean, boolean] = [false, false, false];
  for (const extension of extensions) {
    if (!extension.isEnabled()) continue;
    const bits = extension.reservedBits();
    for (let i = 0; i < claimed.length; i++) {
      claimed[i] = claimed[i] || bits[i];
    }
  }
  return claimed;
}

/**
 * Ensure no two enabled extensions claim the same reserved bit or opcode.
 */
export function assertNoReservedBitConflict(extensions: readonly Extension[]): void {
  const bitOwners: (string | undefined)[] = [undefined, undefined, undefined];
  const opcodeOwners = new Map<ReservedOpCode, string>();

  for (const extension of extensions) {
    if (!extension.isEnabled()) continue;
    const name = extension.name();

    const bits = extension.reservedBits();
    for (let i = 0; i < bitOwners.length; i++) {
      if (!bits[i]) continue;
      const owner = bitOwners[i];
      if (owner !== undefined) {
        throw new NegotiationError(`RSV${i + 1} claimed by both ${owner} and ${name}`);
      }
      bitOwners[i] = name;
    }

    const opcode = extension.reservedOpcode();
    if (opcode !== undefined) {
      const owner = opcodeOwners.get(opcode);
      if (owner !== undefined) {
        throw new NegotiationError(
          `opcode 0x${opcode.toString(16)} claimed by both ${owner} and ${name}`,
        );
      }
      opcodeOwners.set(opcode, name);
    }
  }
}

function toOffer(extension: Extension): ExtensionOffer {
  return { name: extension.name(), params: [...extension.params()] };
}
