/**
 * Message Rewriter
 * Decides whether a message carries signature HTML and splices the rendered body into it
 */

import type {
  EligibilityDecision,
  Logger,
  MimeHeader,
  MimeLeaf,
  MimeMultipart,
  MimePart,
  RewriteOutcome,
  SigmarkConfig,
} from '../types.js';
import { StructuralError, isSigmarkError } from '../errors.js';
import { containsHtmlMarker } from '../signature/classifier.js';
import { splitSignature } from '../signature/splitter.js';
import { assembleBody } from './assembler.js';
import { ContentIdGenerator } from '../mime/content_id.js';
import { createMultipart } from '../mime/builders.js';
import { encodeHeaderText, getContentType, getMessageId, hasHeader } from '../mime/headers.js';
import { decodeTextBody } from '../mime/text.js';
import { DEFAULT_AUDIT_HEADER_VALUE } from '../version.js';

export const DEFAULT_PREAMBLE = 'This is a multi-part message in MIME format...\n';

export type RewriterConfig = Pick<
  SigmarkConfig,
  'imagePath' | 'addAuditHeader' | 'auditHeaderName' | 'auditHeaderValue' | 'textTransferEncoding' | 'contentIdDomain'
>;

// ============================================================================
// Part Lookup
// ============================================================================

function isPlainLeaf(part: MimePart): part is MimeLeaf {
  return part.kind === 'leaf' && getContentType(part) === 'text/plain';
}

/**
 * First text/plain leaf: the root itself, or the first such direct child
 */
export function findFirstTextPart(message: MimePart): MimeLeaf | undefined {
  if (message.kind === 'leaf') {
    return isPlainLeaf(message) ? message : undefined;
  }
  return message.parts.find(isPlainLeaf);
}

function isContentHeader(header: MimeHeader): boolean {
  return header.name.toLowerCase().startsWith('content-');
}

// ============================================================================
// Message Rewriter
// ============================================================================

export class MessageRewriter {
  private config: RewriterConfig;
  private logger: Logger;

  constructor(config: RewriterConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * Eligible when the first text/plain part's signature has an <html> line
   */
  evaluate(message: MimePart): EligibilityDecision {
    const textPart = findFirstTextPart(message);
    if (!textPart) {
      return { eligible: false, signature: '', reason: 'no-text-part' };
    }

    const { signature } = splitSignature(decodeTextBody(textPart));
    if (signature === '') {
      return { eligible: false, signature, reason: 'no-signature' };
    }
    if (!containsHtmlMarker(signature)) {
      return { eligible: false, signature, reason: 'no-marker' };
    }
    return { eligible: true, signature, reason: 'marker-found' };
  }

  isEligible(message: MimePart): boolean {
    return this.evaluate(message).eligible;
  }

  /**
   * Rewrite the message unconditionally. The input tree is never mutated.
   */
  rewrite(message: MimePart): MimePart {
    const messageId = getMessageId(message);
    try {
      const rewritten = message.kind === 'leaf'
        ? this.rewriteSinglePart(message)
        : this.rewriteMultipart(message);

      if (this.config.addAuditHeader) {
        this.logger.debug('Adding audit header', { messageId, header: this.config.auditHeaderName });
        rewritten.headers = [
          ...rewritten.headers,
          {
            name: this.config.auditHeaderName,
            value: encodeHeaderText(this.config.auditHeaderValue ?? DEFAULT_AUDIT_HEADER_VALUE),
          },
        ];
      }
      return rewritten;
    } catch (error) {
      if (isSigmarkError(error)) {
        error.messageId = messageId;
      }
      throw error;
    }
  }

  rewriteIfEligible(message: MimePart): RewriteOutcome {
    const decision = this.evaluate(message);
    if (!decision.eligible) {
      return { message, altered: false, decision };
    }
    return { message: this.rewrite(message), altered: true, decision };
  }

  private renderBody(textPart: MimeLeaf): MimeMultipart {
    const { content, signature } = splitSignature(decodeTextBody(textPart));
    const assembled = assembleBody(content, signature, {
      imageDir: this.config.imagePath,
      textTransferEncoding: this.config.textTransferEncoding,
      contentIds: new ContentIdGenerator(this.config.contentIdDomain),
    });

    this.logger.debug('Assembled HTML body', {
      attachments: assembled.attachments.map(a => a.filename),
      htmlLength: assembled.html.length,
    });
    return assembled.part;
  }

  private rewriteSinglePart(message: MimeLeaf): MimeMultipart {
    if (!isPlainLeaf(message)) {
      throw new StructuralError(`Single-part message is ${getContentType(message)}, not text/plain`);
    }
    this.logger.debug('Rewriting single-part message');

    const body = this.renderBody(message);
    const headers = message.headers.filter(h => !isContentHeader(h));
    if (!hasHeader(headers, 'MIME-Version')) {
      headers.push({ name: 'MIME-Version', value: '1.0' });
    }

    const root = createMultipart('alternative', body.parts, headers);
    root.preamble = DEFAULT_PREAMBLE;
    root.epilogue = '';
    if (message.unixFrom !== undefined) {
      root.unixFrom = message.unixFrom;
    }
    return root;
  }

  private rewriteMultipart(message: MimeMultipart): MimeMultipart {
    const index = message.parts.findIndex(isPlainLeaf);
    const textPart = message.parts[index];
    if (!textPart || !isPlainLeaf(textPart)) {
      throw new StructuralError('Multipart message has no top-level text/plain part');
    }
    this.logger.debug('Rewriting multipart message', { partIndex: index, partCount: message.parts.length });

    const parts = [...message.parts];
    parts[index] = this.renderBody(textPart);
    return { ...message, headers: [...message.headers], parts };
  }
}
