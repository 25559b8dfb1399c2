/**
 * MIME header access and parameter parsing
 */

import type { HeaderValue, MimeHeader, MimePart } from '../types.js';

const FOLDING = /\r?\n[ \t]+/g;

export function unfold(value: string): string {
  return value.replace(FOLDING, ' ').trim();
}

export function getHeader(part: MimePart, name: string): string | undefined {
  const wanted = name.toLowerCase();
  const header = part.headers.find(h => h.name.toLowerCase() === wanted);
  return header ? unfold(header.value) : undefined;
}

export function hasHeader(headers: MimeHeader[], name: string): boolean {
  const wanted = name.toLowerCase();
  return headers.some(h => h.name.toLowerCase() === wanted);
}

/**
 * Parse a structured header value such as
 * `text/plain; charset="utf-8"; format=flowed`
 */
export function parseHeaderValue(raw: string): HeaderValue {
  const text = unfold(raw);
  const params: Record<string, string> = {};

  const first = text.indexOf(';');
  const value = (first === -1 ? text : text.slice(0, first)).trim();
  if (first === -1) {
    return { value, params };
  }

  const paramPattern = /;\s*([^=\s;]+)\s*=\s*(?:"((?:[^"\\]|\\.)*)"|([^;\s]*))/g;
  const paramText = text.slice(first);
  let match;
  while ((match = paramPattern.exec(paramText)) !== null) {
    const key = match[1]?.toLowerCase();
    if (!key) continue;
    const quoted = match[2];
    params[key] = quoted !== undefined ? quoted.replace(/\\(.)/g, '$1') : match[3] ?? '';
  }

  return { value, params };
}

// ============================================================================
// Header Encoding
// ============================================================================

const ENCODED_WORD_PREFIX = '=?utf-8?B?';
const ENCODED_WORD_SUFFIX = '?=';
// 45 bytes encode to 60 base64 chars, keeping each encoded word under 75
const MAX_ENCODED_WORD_BYTES = 45;

export function isAscii(text: string): boolean {
  return /^[\x00-\x7f]*$/.test(text);
}

/**
 * RFC 2231 extended parameter value: `utf-8''<percent-encoded bytes>`
 */
export function encodeParameterValue(value: string): string {
  let encoded = '';
  for (const byte of Buffer.from(value, 'utf-8')) {
    const char = String.fromCharCode(byte);
    encoded += /[A-Za-z0-9._-]/.test(char)
      ? char
      : '%' + byte.toString(16).toUpperCase().padStart(2, '0');
  }
  return `utf-8''${encoded}`;
}

/**
 * RFC 2047 encoded words for unstructured header text. ASCII text is returned
 * unchanged; longer text is split on character boundaries into folded words.
 */
export function encodeHeaderText(text: string): string {
  if (isAscii(text)) {
    return text;
  }

  const chunks: string[] = [];
  let chunk = '';
  for (const char of text) {
    if (chunk !== '' && Buffer.byteLength(chunk + char, 'utf-8') > MAX_ENCODED_WORD_BYTES) {
      chunks.push(chunk);
      chunk = '';
    }
    chunk += char;
  }
  chunks.push(chunk);

  return chunks
    .map(c => ENCODED_WORD_PREFIX + Buffer.from(c, 'utf-8').toString('base64') + ENCODED_WORD_SUFFIX)
    .join('\n ');
}

/**
 * Format a structured value with parameters. Non-ASCII parameter values are
 * written in RFC 2231 form (`filename*=utf-8''...`).
 */
export function formatHeaderValue(value: string, params: Record<string, string>): string {
  let out = value;
  for (const [key, param] of Object.entries(params)) {
    out += isAscii(param)
      ? `; ${key}="${param.replace(/(["\\])/g, '\\$1')}"`
      : `; ${key}*=${encodeParameterValue(param)}`;
  }
  return out;
}

function contentTypeOf(part: MimePart): HeaderValue {
  const raw = getHeader(part, 'Content-Type');
  if (!raw) {
    return { value: 'text/plain', params: {} };
  }
  const parsed = parseHeaderValue(raw);
  return { value: parsed.value.toLowerCase(), params: parsed.params };
}

/**
 * Lower-cased `type/subtype`, `text/plain` when the header is absent
 */
export function getContentType(part: MimePart): string {
  return contentTypeOf(part).value;
}

export function getCharset(part: MimePart): string {
  return (contentTypeOf(part).params['charset'] ?? 'us-ascii').toLowerCase();
}

export function getBoundary(part: MimePart): string | undefined {
  return contentTypeOf(part).params['boundary'];
}

export function getTransferEncoding(part: MimePart): string {
  return (getHeader(part, 'Content-Transfer-Encoding') ?? '7bit').toLowerCase();
}

export function getMessageId(part: MimePart): string {
  return getHeader(part, 'Message-ID') ?? '';
}
