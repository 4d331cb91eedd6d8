/**
 * Sec-WebSocket-Extensions header value codec (RFC 6455, section 9.1).
 *
 * Format: `ext1; param; param=value, ext2; param="quoted value"`
 */

import { ExtensionHeaderError } from "../extension/errors.js";
import { Param } from "../extension/param.js";

/**
 * One extension element of the header: its name and its parameters in
 * wire order.
 */
export interface ExtensionOffer {
  name: string;
  params: Param[];
}

const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/**
 * Parse a Sec-WebSocket-Extensions header value.
 *
 * Empty list elements are skipped. Quoted parameter values are returned
 * without quotes and escapes.
 */
export function parseExtensionHeader(value: string): ExtensionOffer[] {
  const offers: ExtensionOffer[] = [];

  for (const element of splitOutsideQuotes(value, ",", value)) {
    if (!element.trim()) continue;

    const [head, ...rawParams] = splitOutsideQuotes(element, ";", value);
    const name = head.trim();
    if (!TOKEN.test(name)) {
      throw new ExtensionHeaderError(`invalid extension name: "${name}"`, value);
    }

    const params: Param[] = [];
    for (const rawParam of rawParams) {
      params.push(parseParam(rawParam, value));
    }
    offers.push({ name, params });
  }

  return offers;
}

/**
 * Format offers as a Sec-WebSocket-Extensions header value.
 */
export function formatExtensionHeader(offers: readonly ExtensionOffer[]): string {
  return offers
    .map((offer) => [offer.name, ...offer.params.map(formatParam)].join("; "))
    .join(", ");
}

function formatParam(param: Param): string {
  if (param.value === undefined) return param.name;
  if (TOKEN.test(param.value)) return `${param.name}=${param.value}`;
  return `${param.name}="${param.value.replace(/["\\]/g, "\\$&")}"`;
}

function parseParam(rawParam: string, header: string): Param {
  const eqIdx = rawParam.indexOf("=");
  const name = (eqIdx < 0 ? rawParam : rawParam.slice(0, eqIdx)).trim();
  if (!TOKEN.test(name)) {
    throw new ExtensionHeaderError(`invalid parameter name: "${name}"`, header);
  }
  if (eqIdx < 0) {
    return new Param(name);
  }

  const rawValue = rawParam.slice(eqIdx + 1).trim();
  if (rawValue.startsWith('"')) {
    if (rawValue.length < 2 || !rawValue.endsWith('"')) {
      throw new ExtensionHeaderError(`unterminated quoted value for "${name}"`, header);
    }
    return new Param(name, rawValue.slice(1, -1).replace(/\\(.)/g, "$1"));
  }
  if (!TOKEN.test(rawValue)) {
    throw new ExtensionHeaderError(`invalid value for "${name}": "${rawValue}"`, header);
  }
  return new Param(name, rawValue);
}

/**
 * Split on `separator` except inside quoted strings.
 */
function splitOutsideQuotes(text: string, separator: string, header: string): string[] {
  const parts: string[] = [];
  let current = "";
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted && ch === "\\" && i + 1 < text.length) {
      current += ch + text[i + 1];
      i++;
    } else if (ch === '"') {
      quoted = !quoted;
      current += ch;
    } else if (ch === separator && !quoted) {
      parts.push(current);
      current = "";
    } else {
      current += ch;
    }
  }

  if (quoted) {
    throw new ExtensionHeaderError("unterminated quoted string", header);
  }
  parts.push(current);
  return parts;
}
