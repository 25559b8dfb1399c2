/**
 * Signature Splitter
 * Separates the message content from the conventional "-- " signature block
 */

import type { SplitBody } from '../types.js';

export const SIGNATURE_DELIMITER = '-- ';

// A line that is exactly "-- ", trailing space included. Lines end at "\n" only.
const DELIMITER_LINE = /(?:^|\n)-- (?=\n|$)/;

/**
 * Split a decoded body at the first signature delimiter line.
 * The delimiter line itself belongs to neither half.
 */
export function splitSignature(body: string): SplitBody {
  const match = DELIMITER_LINE.exec(body);
  if (!match) {
    return { content: body, signature: '' };
  }

  const start = match[0].startsWith('\n') ? match.index + 1 : match.index;
  const content = body.slice(0, start);
  let rest = body.slice(start + SIGNATURE_DELIMITER.length);
  if (rest.startsWith('\n')) {
    rest = rest.slice(1);
  }

  return { content, signature: rest };
}
