/**
 * Content-ID generation for inline attachments
 */

import { randomBytes } from 'crypto';
import { hostname } from 'os';

/**
 * Mints Content-IDs for one message; use a fresh instance per rewrite
 */
export class ContentIdGenerator {
  private counter = 0;
  private readonly token: string;
  private readonly domain: string;

  constructor(domain?: string) {
    this.token = `${Date.now()}.${randomBytes(6).toString('hex')}`;
    this.domain = domain ?? (hostname() || 'localhost');
  }

  /** Returns `<id>`, angle brackets included */
  next(): string {
    this.counter++;
    return `<part${this.counter}.${this.token}@${this.domain}>`;
  }
}

export function stripAngleBrackets(contentId: string): string {
  return contentId.replace(/^<|>$/g, '');
}
