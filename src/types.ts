/**
 * Sigmark Type Definitions
 * Core types for signature-driven plain to HTML mail rewriting
 */

import { z } from 'zod';

// ============================================================================
// Configuration Types
// ============================================================================

export const TextTransferEncodingSchema = z.enum(['quoted-printable', 'base64']);

export const SigmarkConfigSchema = z.object({
  imagePath: z.string().min(1).default('/var/lib/sigmark'),
  addAuditHeader: z.boolean().default(true),
  auditHeaderName: z.string().regex(/^X-[A-Za-z0-9-]+$/).default('X-Modified-By'),
  auditHeaderValue: z.string().min(1).optional(),
  textTransferEncoding: TextTransferEncodingSchema.default('quoted-printable'),
  onError: z.enum(['passthrough', 'reject']).default('passthrough'),
  maxMessageSize: z.number().min(1024).max(52428800).default(10485760),
  contentIdDomain: z.string().regex(/^[A-Za-z0-9.-]+$/).optional(),
});

export type SigmarkConfig = z.infer<typeof SigmarkConfigSchema>;
export type TextTransferEncoding = z.infer<typeof TextTransferEncodingSchema>;

// ============================================================================
// MIME Tree Types
// ============================================================================

export interface MimeHeader {
  name: string;
  value: string;
}

interface MimeEntityBase {
  headers: MimeHeader[];
  /** mbox envelope line (without the leading "From "), root only */
  unixFrom?: string;
}

export interface MimeLeaf extends MimeEntityBase {
  kind: 'leaf';
  /** Transfer-decoded bytes */
  body: Buffer;
}

export interface MimeMultipart extends MimeEntityBase {
  kind: 'multipart';
  parts: MimePart[];
  preamble?: string;
  epilogue?: string;
}

export type MimePart = MimeLeaf | MimeMultipart;

export interface HeaderValue {
  value: string;
  params: Record<string, string>;
}

// ============================================================================
// Signature Types
// ============================================================================

export type SegmentKind = 'html' | 'plain';

export interface TextSegment {
  kind: SegmentKind;
  text: string;
  lineCount: number;
}

export interface SplitBody {
  content: string;
  signature: string;
}

export type EligibilityReason = 'marker-found' | 'no-text-part' | 'no-signature' | 'no-marker';

export interface EligibilityDecision {
  eligible: boolean;
  signature: string;
  reason: EligibilityReason;
}

// ============================================================================
// Image Types
// ============================================================================

export interface ImageReference {
  /** Offset of the tag's first character */
  start: number;
  /** Offset one past the tag's last character */
  end: number;
  tag: string;
  source: string;
  /** Tag text up to and including the opening quote of src */
  prefix: string;
  /** Tag text from the closing quote of src */
  suffix: string;
}

export interface ResolvedAttachment {
  /** Content-ID header value, angle brackets included */
  contentId: string;
  data: Buffer;
  filename: string;
  subtype: string;
  source: string;
}

export interface ResolvedHtml {
  html: string;
  attachments: ResolvedAttachment[];
}

// ============================================================================
// Rewrite Types
// ============================================================================

export interface AssembledBody {
  part: MimeMultipart;
  plainText: string;
  html: string;
  attachments: ResolvedAttachment[];
}

export interface RewriteOutcome {
  message: MimePart;
  altered: boolean;
  decision: EligibilityDecision;
}

export interface FilterResult {
  requestId: string;
  messageId: string;
  altered: boolean;
  output: Buffer;
  processingTimeMs: number;
}

export interface FilterStats {
  processed: number;
  altered: number;
  passed: number;
  failed: number;
}

// ============================================================================
// Audit Log Types
// ============================================================================

export interface AuditLogEntry {
  timestamp: Date;
  eventType: AuditEventType;
  requestId: string;
  messageId?: string;
  details: Record<string, unknown>;
}

export type AuditEventType =
  | 'message_altered'
  | 'message_passed'
  | 'payload_skipped'
  | 'rewrite_failed';

// ============================================================================
// Plugin Host Interface Types
// ============================================================================

export interface PluginContext {
  config: unknown;
  logger: Logger;
  gateway: GatewayContext;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface GatewayContext {
  registerMailFilter(filter: MailFilterRegistration): void;
  registerCliCommand(command: CliCommand): void;
  emitAuditLog(entry: AuditLogEntry): void;
}

export interface MailFilterRegistration {
  name: string;
  handler: (raw: Buffer) => Promise<FilterResult>;
}

export interface CliCommand {
  name: string;
  description: string;
  options?: CliOption[];
  handler: (args: Record<string, unknown>) => Promise<void>;
}

export interface CliOption {
  name: string;
  alias?: string;
  description: string;
  type: 'string' | 'boolean' | 'number';
  required?: boolean;
  default?: unknown;
}
