/**
 * Body Assembler
 * Turns content and signature text into a multipart/alternative plain + HTML tree
 */

import type {
  AssembledBody,
  MimePart,
  ResolvedAttachment,
  TextSegment,
  TextTransferEncoding,
} from '../types.js';
import { classifySignature } from '../signature/classifier.js';
import { SIGNATURE_DELIMITER } from '../signature/splitter.js';
import { HtmlDocument } from '../html/document.js';
import { hasResolvableImages, resolveImages } from '../html/image_resolver.js';
import { ContentIdGenerator } from '../mime/content_id.js';
import { createImagePart, createMultipart, createTextPart } from '../mime/builders.js';

export interface AssembleOptions {
  imageDir: string;
  textTransferEncoding: TextTransferEncoding;
  contentIds: ContentIdGenerator;
}

/**
 * Plain fallback: content, delimiter, then only the plain-mode signature lines
 */
export function buildPlainText(content: string, segments: TextSegment[]): string {
  let text = content;
  if (text !== '' && !text.endsWith('\n')) {
    text += '\n';
  }
  text += SIGNATURE_DELIMITER + '\n';
  for (const segment of segments) {
    if (segment.kind === 'plain') {
      text += segment.text;
    }
  }
  return text;
}

export function buildHtml(content: string, segments: TextSegment[]): string {
  const doc = new HtmlDocument();
  doc.addText(content);
  for (const segment of segments) {
    if (segment.kind === 'html') {
      doc.addHtml(segment.text);
    } else {
      doc.addText(segment.text);
    }
  }
  return doc.render();
}

export function assembleBody(content: string, signature: string, options: AssembleOptions): AssembledBody {
  const segments = classifySignature(signature);
  const plainText = buildPlainText(content, segments);
  let html = buildHtml(content, segments);
  let attachments: ResolvedAttachment[] = [];

  let htmlPart: MimePart;
  if (hasResolvableImages(html)) {
    const resolved = resolveImages(html, options.imageDir, options.contentIds);
    html = resolved.html;
    attachments = resolved.attachments;
    htmlPart = createMultipart('related', [
      createTextPart(html, 'html', options.textTransferEncoding),
      ...attachments.map(createImagePart),
    ]);
  } else {
    htmlPart = createTextPart(html, 'html', options.textTransferEncoding);
  }

  const part = createMultipart('alternative', [
    createTextPart(plainText, 'plain', options.textTransferEncoding),
    htmlPart,
  ]);

  return { part, plainText, html, attachments };
}
