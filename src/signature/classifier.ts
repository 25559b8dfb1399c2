/**
 * Signature Text Classifier
 * Segments a signature into literal-HTML and plain runs using <html> / </html> marker lines
 */

import type { SegmentKind, TextSegment } from '../types.js';

export const HTML_OPEN_MARKER = '<html>';
export const HTML_CLOSE_MARKER = '</html>';

// ============================================================================
// Automaton
// ============================================================================

type LineEvent =
  | { type: 'open' }
  | { type: 'close' }
  | { type: 'line'; text: string };

const TRANSITIONS: Record<SegmentKind, Record<'open' | 'close', SegmentKind>> = {
  plain: { open: 'html', close: 'plain' },
  html: { open: 'html', close: 'plain' },
};

function toEvent(line: string): LineEvent {
  if (line === HTML_OPEN_MARKER) return { type: 'open' };
  if (line === HTML_CLOSE_MARKER) return { type: 'close' };
  return { type: 'line', text: line };
}

/**
 * Split text into lines, without the phantom empty line after a final newline
 */
function toLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n');
  if (text.endsWith('\n')) {
    lines.pop();
  }
  return lines;
}

class SegmentCollector {
  private segments: TextSegment[] = [];
  private open: TextSegment | null = null;

  append(kind: SegmentKind, line: string): void {
    if (!this.open || this.open.kind !== kind) {
      this.close();
      this.open = { kind, text: '', lineCount: 0 };
    }
    this.open.text += line + '\n';
    this.open.lineCount++;
  }

  close(): void {
    if (this.open && this.open.lineCount > 0) {
      this.segments.push(this.open);
    }
    this.open = null;
  }

  finish(): TextSegment[] {
    this.close();
    return this.segments;
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Classify signature lines into ordered html / plain segments.
 * Marker lines switch the mode and are dropped from the output.
 */
export function classifySignature(signature: string): TextSegment[] {
  const collector = new SegmentCollector();
  let state: SegmentKind = 'plain';

  for (const line of toLines(signature)) {
    const event = toEvent(line);
    if (event.type === 'line') {
      collector.append(state, event.text);
    } else {
      const next: SegmentKind = TRANSITIONS[state][event.type];
      if (next !== state) {
        collector.close();
      }
      state = next;
    }
  }

  return collector.finish();
}

/**
 * True when some line of the text is exactly the opening marker
 */
export function containsHtmlMarker(text: string): boolean {
  return toLines(text).some(line => toEvent(line).type === 'open');
}
