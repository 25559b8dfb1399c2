/**
 * MIME Serializer
 * Encodes a MimePart tree back to wire format
 */

import type { MimePart } from '../types.js';
import { DecodeError } from '../errors.js';
import { encodeTransfer } from './encoding.js';
import { getBoundary, getTransferEncoding } from './headers.js';

export type LineEnding = '\r\n' | '\n';

export interface SerializeOptions {
  eol?: LineEnding;
  includeUnixFrom?: boolean;
}

function serializeEntity(part: MimePart): string {
  let out = '';
  for (const header of part.headers) {
    out += `${header.name}: ${header.value}\n`;
  }
  out += '\n';

  if (part.kind === 'leaf') {
    return out + encodeTransfer(part.body, getTransferEncoding(part));
  }

  const boundary = getBoundary(part);
  if (!boundary) {
    throw new DecodeError('mime-serializer', 'Multipart entity has no boundary parameter');
  }

  if (part.preamble !== undefined) {
    out += part.preamble + '\n';
  }
  for (const child of part.parts) {
    out += `--${boundary}\n${serializeEntity(child)}\n`;
  }
  out += `--${boundary}--`;
  if (part.epilogue !== undefined) {
    out += '\n' + part.epilogue;
  }
  return out;
}

/**
 * Serialize a message tree. Text is assembled with "\n" and converted to the
 * requested line ending at the end, so header folds and bodies follow it too.
 */
export function serializeMessage(message: MimePart, options: SerializeOptions = {}): Buffer {
  const eol = options.eol ?? '\r\n';
  let text = serializeEntity(message);
  if (options.includeUnixFrom !== false && message.unixFrom !== undefined) {
    text = `From ${message.unixFrom}\n` + text;
  }
  if (eol === '\r\n') {
    text = text.replace(/\r?\n/g, '\r\n');
  }
  return Buffer.from(text, 'latin1');
}

export function detectLineEnding(raw: Buffer | string): LineEnding {
  return raw.indexOf('\r\n') !== -1 ? '\r\n' : '\n';
}
