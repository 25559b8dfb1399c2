/**
 * MIME Parser
 * Decodes a raw RFC 5322 message into a MimePart tree
 */

import type { MimeHeader, MimePart } from '../types.js';
import { DecodeError } from '../errors.js';
import { decodeTransfer } from './encoding.js';
import { getBoundary, getContentType, getTransferEncoding } from './headers.js';

const HEADER_LINE = /^([!-9;-~]+):[ \t]?(.*)$/;
const CONTINUATION_LINE = /^[ \t]/;
const UNIX_FROM = 'From ';

function parseHeaders(lines: string[]): MimeHeader[] {
  const headers: MimeHeader[] = [];
  for (const line of lines) {
    const last = headers[headers.length - 1];
    if (CONTINUATION_LINE.test(line) && last) {
      last.value += '\n' + line;
      continue;
    }
    const match = HEADER_LINE.exec(line);
    if (!match) {
      throw new DecodeError('mime-parser', `Malformed header line: ${line.slice(0, 60)}`);
    }
    headers.push({ name: match[1] ?? '', value: match[2] ?? '' });
  }
  return headers;
}

function isDelimiter(line: string, boundary: string): boolean {
  return line.startsWith('--' + boundary) && line.slice(boundary.length + 2).trim() === '';
}

function isCloseDelimiter(line: string, boundary: string): boolean {
  return line.startsWith('--' + boundary + '--') && line.slice(boundary.length + 4).trim() === '';
}

function parseEntity(lines: string[]): MimePart {
  const blank = lines.indexOf('');
  const headerLines = blank === -1 ? lines : lines.slice(0, blank);
  const bodyLines = blank === -1 ? [] : lines.slice(blank + 1);
  const headers = parseHeaders(headerLines);

  const probe: MimePart = { kind: 'leaf', headers, body: Buffer.alloc(0) };
  if (!getContentType(probe).startsWith('multipart/')) {
    return {
      kind: 'leaf',
      headers,
      body: decodeTransfer(bodyLines.join('\n'), getTransferEncoding(probe)),
    };
  }

  const boundary = getBoundary(probe);
  if (!boundary) {
    throw new DecodeError('mime-parser', 'Multipart entity has no boundary parameter');
  }

  const preamble: string[] = [];
  const sections: string[][] = [];
  let epilogue: string[] | undefined;
  let current: string[] | undefined;

  for (const line of bodyLines) {
    if (epilogue) {
      epilogue.push(line);
    } else if (isCloseDelimiter(line, boundary)) {
      if (current) sections.push(current);
      current = undefined;
      epilogue = [];
    } else if (isDelimiter(line, boundary)) {
      if (current) sections.push(current);
      current = [];
    } else if (current) {
      current.push(line);
    } else {
      preamble.push(line);
    }
  }
  // Unterminated multipart: the last part runs to the end of input
  if (current) sections.push(current);

  return {
    kind: 'multipart',
    headers,
    parts: sections.map(parseEntity),
    preamble: preamble.length > 0 ? preamble.join('\n') : undefined,
    epilogue: epilogue && epilogue.length > 0 ? epilogue.join('\n') : undefined,
  };
}

/**
 * Parse a raw message. LF and CRLF line endings are both accepted; bytes are
 * kept as latin1 until a leaf is transfer-decoded. A string is taken as UTF-8.
 */
export function parseMessage(raw: Buffer | string): MimePart {
  const bytes = typeof raw === 'string' ? Buffer.from(raw, 'utf-8') : raw;
  const text = bytes.toString('latin1');
  const lines = text.split(/\r?\n/);

  let unixFrom: string | undefined;
  if (lines[0]?.startsWith(UNIX_FROM)) {
    unixFrom = lines.shift()?.slice(UNIX_FROM.length);
  }

  const root = parseEntity(lines);
  return unixFrom !== undefined ? { ...root, unixFrom } : root;
}
