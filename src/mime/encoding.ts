/**
 * Content-Transfer-Encoding codecs
 */

const MAX_LINE_LENGTH = 76;

// ============================================================================
// Base64
// ============================================================================

export function encodeBase64(data: Buffer): string {
  const encoded = data.toString('base64');
  const lines: string[] = [];
  for (let i = 0; i < encoded.length; i += MAX_LINE_LENGTH) {
    lines.push(encoded.slice(i, i + MAX_LINE_LENGTH));
  }
  return lines.join('\n');
}

export function decodeBase64(text: string): Buffer {
  return Buffer.from(text.replace(/[^A-Za-z0-9+/=]/g, ''), 'base64');
}

// ============================================================================
// Quoted-Printable
// ============================================================================

function hexByte(byte: number): string {
  return '=' + byte.toString(16).toUpperCase().padStart(2, '0');
}

function isLiteral(byte: number): boolean {
  // Printable ASCII except "="
  return byte >= 33 && byte <= 126 && byte !== 61;
}

function encodeQuotedLine(line: Buffer): string {
  const tokens: string[] = [];
  for (let i = 0; i < line.length; i++) {
    const byte = line[i] ?? 0;
    const isLast = i === line.length - 1;
    if (isLiteral(byte)) {
      tokens.push(String.fromCharCode(byte));
    } else if ((byte === 32 || byte === 9) && !isLast) {
      tokens.push(String.fromCharCode(byte));
    } else {
      tokens.push(hexByte(byte));
    }
  }

  // Soft line breaks, never splitting an =XX token
  const out: string[] = [];
  let current = '';
  for (const token of tokens) {
    if (current.length + token.length > MAX_LINE_LENGTH - 1) {
      out.push(current + '=');
      current = '';
    }
    current += token;
  }
  out.push(current);
  return out.join('\n');
}

/**
 * Encode bytes as quoted-printable. "\n" bytes are hard line breaks.
 */
export function encodeQuotedPrintable(data: Buffer): string {
  const lines: string[] = [];
  let start = 0;
  for (let i = 0; i <= data.length; i++) {
    if (i === data.length || data[i] === 10) {
      lines.push(encodeQuotedLine(data.subarray(start, i)));
      start = i + 1;
    }
  }
  return lines.join('\n');
}

export function decodeQuotedPrintable(text: string): Buffer {
  const joined = text
    .replace(/[ \t]+(?=\r?\n|$)/g, '')
    .replace(/=\r?\n/g, '')
    .replace(/\r\n/g, '\n');

  const bytes: number[] = [];
  for (let i = 0; i < joined.length; i++) {
    const char = joined[i] ?? '';
    if (char === '=' && /^[0-9A-Fa-f]{2}$/.test(joined.slice(i + 1, i + 3))) {
      bytes.push(parseInt(joined.slice(i + 1, i + 3), 16));
      i += 2;
    } else {
      bytes.push(joined.charCodeAt(i) & 0xff);
    }
  }
  return Buffer.from(bytes);
}

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Decode a leaf body. `text` is the raw body as a latin1 string, lines joined by "\n".
 */
export function decodeTransfer(text: string, encoding: string): Buffer {
  switch (encoding) {
    case 'base64':
      return decodeBase64(text);
    case 'quoted-printable':
      return decodeQuotedPrintable(text);
    default:
      return Buffer.from(text, 'latin1');
  }
}

/**
 * Encode a leaf body to a latin1 string with "\n" line breaks
 */
export function encodeTransfer(data: Buffer, encoding: string): string {
  switch (encoding) {
    case 'base64':
      return encodeBase64(data);
    case 'quoted-printable':
      return encodeQuotedPrintable(data);
    default:
      return data.toString('latin1');
  }
}
