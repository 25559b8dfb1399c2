/**
 * Constructors for the MIME parts the rewriter emits
 */

import { randomBytes } from 'crypto';

import type {
  MimeHeader,
  MimeLeaf,
  MimeMultipart,
  MimePart,
  ResolvedAttachment,
  TextTransferEncoding,
} from '../types.js';
import { formatHeaderValue } from './headers.js';

export function generateBoundary(): string {
  return `----=_Part_${randomBytes(12).toString('hex')}`;
}

export function createTextPart(
  text: string,
  subtype: 'plain' | 'html',
  encoding: TextTransferEncoding
): MimeLeaf {
  return {
    kind: 'leaf',
    headers: [
      { name: 'Content-Type', value: formatHeaderValue(`text/${subtype}`, { charset: 'utf-8' }) },
      { name: 'Content-Transfer-Encoding', value: encoding },
    ],
    body: Buffer.from(text, 'utf-8'),
  };
}

export function createImagePart(attachment: ResolvedAttachment): MimeLeaf {
  return {
    kind: 'leaf',
    headers: [
      { name: 'Content-Type', value: `image/${attachment.subtype}` },
      { name: 'Content-Transfer-Encoding', value: 'base64' },
      { name: 'Content-ID', value: attachment.contentId },
      { name: 'Content-Disposition', value: formatHeaderValue('attachment', { filename: attachment.filename }) },
    ],
    body: attachment.data,
  };
}

/**
 * Build a multipart container. `headers` are placed before the generated Content-Type.
 */
export function createMultipart(
  subtype: 'alternative' | 'related',
  parts: MimePart[],
  headers: MimeHeader[] = []
): MimeMultipart {
  return {
    kind: 'multipart',
    headers: [
      ...headers,
      {
        name: 'Content-Type',
        value: formatHeaderValue(`multipart/${subtype}`, { boundary: generateBoundary() }),
      },
    ],
    parts,
  };
}
