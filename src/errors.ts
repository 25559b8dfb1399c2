/**
 * Error types raised by the rewrite engine and the MIME codec
 */

export type SigmarkErrorCode = 'DECODE_FAILED' | 'IMAGE_UNRESOLVABLE' | 'NO_TEXT_PART';

export type SigmarkComponent =
  | 'mime-parser'
  | 'mime-serializer'
  | 'text-decoder'
  | 'image-resolver'
  | 'message-rewriter';

export class SigmarkError extends Error {
  readonly code: SigmarkErrorCode;
  readonly component: SigmarkComponent;
  /** Message-ID of the mail being processed, filled in by the rewriter */
  messageId?: string;

  constructor(
    code: SigmarkErrorCode,
    component: SigmarkComponent,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SigmarkError';
    this.code = code;
    this.component = component;
  }

  toLogContext(): Record<string, unknown> {
    return {
      code: this.code,
      component: this.component,
      messageId: this.messageId,
      error: this.message,
    };
  }
}

export class DecodeError extends SigmarkError {
  constructor(component: SigmarkComponent, message: string, options?: { cause?: unknown }) {
    super('DECODE_FAILED', component, message, options);
    this.name = 'DecodeError';
  }
}

export class ImageResolutionError extends SigmarkError {
  readonly source: string;
  readonly path: string;

  constructor(source: string, path: string, reason: string, options?: { cause?: unknown }) {
    super('IMAGE_UNRESOLVABLE', 'image-resolver', `Cannot resolve image "${source}" (${path}): ${reason}`, options);
    this.name = 'ImageResolutionError';
    this.source = source;
    this.path = path;
  }

  override toLogContext(): Record<string, unknown> {
    return { ...super.toLogContext(), source: this.source, path: this.path };
  }
}

export class StructuralError extends SigmarkError {
  constructor(message: string) {
    super('NO_TEXT_PART', 'message-rewriter', message);
    this.name = 'StructuralError';
  }
}

export function isSigmarkError(error: unknown): error is SigmarkError {
  return error instanceof SigmarkError;
}
