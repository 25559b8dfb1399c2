/**
 * Image Resolver
 * Replaces local image references in HTML with cid: references to inline attachments
 */

import { readFileSync } from 'fs';
import { join, posix } from 'path';

import type { ImageReference, ResolvedAttachment, ResolvedHtml } from '../types.js';
import { ImageResolutionError } from '../errors.js';
import { ContentIdGenerator, stripAngleBrackets } from '../mime/content_id.js';

// Single-line only: a tag broken across lines is not matched
const IMG_TAG = /(<img[ \t][^>\n]*src=")([^"\n]+)("[^>\n]*>)/g;

// Base for relative references; bare paths then parse as file: URLs
const LOCAL_BASE = 'file:///';

// ============================================================================
// Image Type Detection
// ============================================================================

interface MagicSignature {
  subtype: string;
  matches: (data: Buffer) => boolean;
}

function startsWith(data: Buffer, bytes: number[], offset = 0): boolean {
  return bytes.every((byte, i) => data[offset + i] === byte);
}

const MAGIC_SIGNATURES: MagicSignature[] = [
  { subtype: 'png', matches: d => startsWith(d, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]) },
  { subtype: 'jpeg', matches: d => startsWith(d, [0xff, 0xd8, 0xff]) },
  { subtype: 'gif', matches: d => d.subarray(0, 6).toString('latin1') === 'GIF87a' || d.subarray(0, 6).toString('latin1') === 'GIF89a' },
  { subtype: 'bmp', matches: d => startsWith(d, [0x42, 0x4d]) },
  {
    subtype: 'webp',
    matches: d => d.subarray(0, 4).toString('latin1') === 'RIFF' && d.subarray(8, 12).toString('latin1') === 'WEBP',
  },
  { subtype: 'tiff', matches: d => startsWith(d, [0x49, 0x49, 0x2a, 0x00]) || startsWith(d, [0x4d, 0x4d, 0x00, 0x2a]) },
  { subtype: 'x-icon', matches: d => startsWith(d, [0x00, 0x00, 0x01, 0x00]) },
  {
    subtype: 'svg+xml',
    matches: d => /^\s*(?:<\?xml[^>]*>\s*)?(?:<!--[\s\S]*?-->\s*)*<svg[\s>]/i.test(d.subarray(0, 512).toString('utf-8')),
  },
];

/**
 * Infer an image subtype from file content, undefined when unrecognized
 */
export function detectImageSubtype(data: Buffer): string | undefined {
  return MAGIC_SIGNATURES.find(sig => sig.matches(data))?.subtype;
}

// ============================================================================
// Reference Scanning
// ============================================================================

export function findImageReferences(html: string): ImageReference[] {
  const references: ImageReference[] = [];
  for (const match of html.matchAll(IMG_TAG)) {
    const [tag, prefix = '', source = '', suffix = ''] = match;
    const start = match.index ?? 0;
    references.push({ start, end: start + tag.length, tag, source, prefix, suffix });
  }
  return references;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Path component of a local (schemeless or file:) image source, undefined otherwise
 */
export function localImagePath(source: string): string | undefined {
  let url: URL;
  try {
    url = new URL(source, LOCAL_BASE);
  } catch {
    return undefined;
  }
  if (url.protocol !== 'file:') {
    return undefined;
  }
  const path = safeDecode(url.pathname);
  return path === '/' ? undefined : path;
}

/**
 * True when at least one image tag points at a local file
 */
export function hasResolvableImages(html: string): boolean {
  return findImageReferences(html).some(ref => localImagePath(ref.source) !== undefined);
}

// ============================================================================
// Resolution
// ============================================================================

function loadAttachment(
  source: string,
  path: string,
  imageDir: string,
  contentIds: ContentIdGenerator
): ResolvedAttachment {
  const filename = posix.basename(path);
  const filePath = join(imageDir, filename);

  let data: Buffer;
  try {
    data = readFileSync(filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ImageResolutionError(source, filePath, reason, { cause: error });
  }

  const subtype = detectImageSubtype(data);
  if (!subtype) {
    throw new ImageResolutionError(source, filePath, 'unrecognized image format');
  }

  return { contentId: contentIds.next(), data, filename, subtype, source };
}

/**
 * Rewrite every local image reference to a cid: URL and load the images.
 * Any failing reference aborts the whole call; nothing partial is returned.
 */
export function resolveImages(
  html: string,
  imageDir: string,
  contentIds: ContentIdGenerator
): ResolvedHtml {
  const attachments: ResolvedAttachment[] = [];
  let out = '';
  let cursor = 0;

  for (const ref of findImageReferences(html)) {
    const path = localImagePath(ref.source);
    if (path === undefined) continue;

    const attachment = loadAttachment(ref.source, path, imageDir, contentIds);
    attachments.push(attachment);

    out += html.slice(cursor, ref.start);
    out += `${ref.prefix}cid:${stripAngleBrackets(attachment.contentId)}${ref.suffix}`;
    cursor = ref.end;
  }
  out += html.slice(cursor);

  return { html: out, attachments };
}
