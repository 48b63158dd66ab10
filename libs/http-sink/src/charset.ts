import { EncodingError } from '@batchsink/resilient-http-core';

export type CharsetName = 'UTF-8' | 'ISO-8859-1' | 'US-ASCII' | 'UTF-16LE';

const NODE_ENCODINGS: Record<CharsetName, BufferEncoding> = {
  'UTF-8': 'utf8',
  'ISO-8859-1': 'latin1',
  'US-ASCII': 'ascii',
  'UTF-16LE': 'utf16le',
};

const ALIASES: Record<string, CharsetName> = {
  'utf-8': 'UTF-8',
  utf8: 'UTF-8',
  'iso-8859-1': 'ISO-8859-1',
  latin1: 'ISO-8859-1',
  'us-ascii': 'US-ASCII',
  ascii: 'US-ASCII',
  'utf-16le': 'UTF-16LE',
  utf16le: 'UTF-16LE',
};

export const SUPPORTED_CHARSETS: readonly CharsetName[] = Object.freeze(Object.keys(NODE_ENCODINGS).filter(isCharsetName));

function isCharsetName(value: string): value is CharsetName {
  return value in NODE_ENCODINGS;
}

/** Canonical name for `name` (case-insensitive), or undefined when unsupported. */
export function normalizeCharset(name: string): CharsetName | undefined {
  return ALIASES[name.trim().toLowerCase()];
}

/** Highest code point a single-byte charset can represent. */
const MAX_CODE_POINT: Partial<Record<CharsetName, number>> = {
  'ISO-8859-1': 0xff,
  'US-ASCII': 0x7f,
};

const REPLACEMENT = '?';

function resolveCharset(charset: string): CharsetName {
  const canonical = normalizeCharset(charset);
  if (!canonical) {
    throw new EncodingError(`Unsupported charset '${charset}'. Supported charsets: ${SUPPORTED_CHARSETS.join(', ')}.`);
  }
  return canonical;
}

/** Replaces every character `charset` cannot represent with `?`. */
function representable(text: string, charset: CharsetName): string {
  const max = MAX_CODE_POINT[charset];
  if (max === undefined) return text;
  let out = '';
  for (const char of text) {
    out += (char.codePointAt(0) ?? 0) > max ? REPLACEMENT : char;
  }
  return out;
}

/**
 * Encodes `text` in `charset`. Characters outside a single-byte charset are
 * sent as `?`.
 */
export function encodeText(text: string, charset: string): Uint8Array {
  const canonical = resolveCharset(charset);
  return Buffer.from(representable(text, canonical), NODE_ENCODINGS[canonical]);
}

const UNRESERVED = /^[A-Za-z0-9.\-*_]$/;

/**
 * `application/x-www-form-urlencoded` encoding of `value` in `charset`:
 * unreserved characters pass through, spaces become `+`, everything else is
 * written as `%XX` per encoded byte. Characters the charset cannot represent
 * are encoded as `?` (`%3F`).
 */
export function urlEncode(value: string, charset: string): string {
  const canonical = resolveCharset(charset);
  let out = '';
  for (const char of representable(value, canonical)) {
    if (UNRESERVED.test(char)) {
      out += char;
    } else if (char === ' ') {
      out += '+';
    } else {
      for (const byte of Buffer.from(char, NODE_ENCODINGS[canonical])) {
        out += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
      }
    }
  }
  return out;
}
