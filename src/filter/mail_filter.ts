/**
 * Mail Filter
 * Runs the decode, rewrite and encode cycle for one raw message at a time
 */

import { randomUUID } from 'crypto';

import type {
  AuditLogEntry,
  FilterResult,
  FilterStats,
  Logger,
  MimePart,
  SigmarkConfig,
} from '../types.js';
import { isSigmarkError } from '../errors.js';
import { parseMessage } from '../mime/parser.js';
import { detectLineEnding, serializeMessage } from '../mime/serializer.js';
import { getMessageId } from '../mime/headers.js';
import { MessageRewriter } from '../rewrite/rewriter.js';

export type AuditSink = (entry: AuditLogEntry) => void;

function generateRequestId(): string {
  return `sm-${randomUUID()}`;
}

function emptyStats(): FilterStats {
  return { processed: 0, altered: 0, passed: 0, failed: 0 };
}

export class MailFilter {
  private config: SigmarkConfig;
  private logger: Logger;
  private audit: AuditSink;
  private rewriter: MessageRewriter;
  private stats: FilterStats = emptyStats();

  constructor(config: SigmarkConfig, logger: Logger, audit: AuditSink = () => {}) {
    this.config = config;
    this.logger = logger;
    this.audit = audit;
    this.rewriter = new MessageRewriter(config, logger);
  }

  /**
   * Filter one raw message. Messages that are not altered come back byte for byte.
   * With `onError: 'reject'` engine failures are rethrown for the caller to reject the mail.
   */
  process(raw: Buffer | string): FilterResult {
    const startTime = Date.now();
    const requestId = generateRequestId();
    const input = typeof raw === 'string' ? Buffer.from(raw, 'utf-8') : raw;
    this.stats.processed++;

    if (input.length > this.config.maxMessageSize) {
      this.logger.warn('Message too large, passing through', {
        requestId,
        size: input.length,
        maxSize: this.config.maxMessageSize,
      });
      this.emitAudit('payload_skipped', requestId, '', { size: input.length });
      return this.passThrough(input, requestId, '', startTime);
    }

    let messageId = '';
    try {
      const message = parseMessage(input);
      messageId = getMessageId(message);

      const outcome = this.rewriter.rewriteIfEligible(message);
      if (!outcome.altered) {
        this.logger.info(`Msg(${messageId}): nothing to alter`, { requestId, reason: outcome.decision.reason });
        this.emitAudit('message_passed', requestId, messageId, { reason: outcome.decision.reason });
        return this.passThrough(input, requestId, messageId, startTime);
      }

      const output = this.encode(outcome.message, input);
      this.stats.altered++;
      this.logger.info(`Msg(${messageId}): altered`, { requestId });
      this.emitAudit('message_altered', requestId, messageId, {
        inputSize: input.length,
        outputSize: output.length,
      });

      return {
        requestId,
        messageId,
        altered: true,
        output,
        processingTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      this.stats.failed++;
      const context = isSigmarkError(error)
        ? error.toLogContext()
        : { error: error instanceof Error ? error.message : String(error) };

      this.logger.error('Rewrite failed', { requestId, messageId, ...context, onError: this.config.onError });
      this.emitAudit('rewrite_failed', requestId, messageId, { ...context, onError: this.config.onError });

      if (this.config.onError === 'reject') {
        throw error;
      }
      return {
        requestId,
        messageId,
        altered: false,
        output: input,
        processingTimeMs: Date.now() - startTime,
      };
    }
  }

  getStats(): FilterStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = emptyStats();
  }

  private encode(message: MimePart, input: Buffer): Buffer {
    return serializeMessage(message, { eol: detectLineEnding(input) });
  }

  private passThrough(input: Buffer, requestId: string, messageId: string, startTime: number): FilterResult {
    this.stats.passed++;
    return {
      requestId,
      messageId,
      altered: false,
      output: input,
      processingTimeMs: Date.now() - startTime,
    };
  }

  private emitAudit(
    eventType: AuditLogEntry['eventType'],
    requestId: string,
    messageId: string,
    details: Record<string, unknown>
  ): void {
    this.audit({
      timestamp: new Date(),
      eventType,
      requestId,
      messageId: messageId || undefined,
      details,
    });
  }
}
