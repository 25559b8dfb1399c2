/**
 * Text body decoding
 * Normalizes text/* leaves to a JavaScript string with "\n" line endings
 */

import iconv from 'iconv-lite';

import type { MimeLeaf } from '../types.js';
import { DecodeError } from '../errors.js';
import { getCharset } from './headers.js';

// us-ascii bodies are read as UTF-8
const UTF8_ALIASES = new Set(['utf-8', 'utf8', 'us-ascii', 'ascii']);

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

export function decodeText(data: Buffer, charset: string): string {
  const name = charset.toLowerCase();

  if (UTF8_ALIASES.has(name)) {
    try {
      return strictUtf8.decode(data);
    } catch (error) {
      throw new DecodeError('text-decoder', `Body is not valid ${name} text`, { cause: error });
    }
  }

  if (!iconv.encodingExists(name)) {
    throw new DecodeError('text-decoder', `Unknown charset: ${charset}`);
  }
  return iconv.decode(data, name);
}

/**
 * Decode a text leaf using its declared charset
 */
export function decodeTextBody(leaf: MimeLeaf): string {
  return decodeText(leaf.body, getCharset(leaf)).replace(/\r\n?/g, '\n');
}
