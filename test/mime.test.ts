/**
 * MIME Codec Tests
 */

import { describe, it, expect } from 'vitest';
import { parseMessage } from '../src/mime/parser.js';
import { detectLineEnding, serializeMessage } from '../src/mime/serializer.js';
import {
  decodeQuotedPrintable,
  encodeBase64,
  encodeQuotedPrintable,
} from '../src/mime/encoding.js';
import {
  encodeHeaderText,
  formatHeaderValue,
  getBoundary,
  getCharset,
  getContentType,
  getHeader,
  parseHeaderValue,
} from '../src/mime/headers.js';
import { decodeText, decodeTextBody } from '../src/mime/text.js';
import { createImagePart, createTextPart } from '../src/mime/builders.js';
import { DecodeError } from '../src/errors.js';
import type { MimeLeaf, MimePart } from '../src/types.js';

function bodyOf(part: MimePart | undefined): string {
  return part?.kind === 'leaf' ? part.body.toString() : '';
}

const MULTIPART = [
  'From: a@example.com',
  'Content-Type: multipart/mixed; boundary="b1"',
  '',
  'Preamble text',
  '--b1',
  'Content-Type: text/plain',
  '',
  'Hello',
  '--b1',
  'Content-Type: text/html',
  '',
  '<p>Hi</p>',
  '--b1--',
  'Epilogue',
  '',
].join('\n');

describe('headers', () => {
  it('should parse structured values with quoted and bare parameters', () => {
    expect(parseHeaderValue('text/plain; charset="utf-8"; format=flowed')).toEqual({
      value: 'text/plain',
      params: { charset: 'utf-8', format: 'flowed' },
    });
  });

  it('should lower-case parameter names and unescape quotes', () => {
    expect(parseHeaderValue('attachment; FileName="a \\"b\\".png"').params).toEqual({
      filename: 'a "b".png',
    });
  });

  it('should apply RFC 2045 defaults', () => {
    const part = parseMessage('Subject: x\n\nbody\n');

    expect(getContentType(part)).toBe('text/plain');
    expect(getCharset(part)).toBe('us-ascii');
  });

  it('should unfold header values on read', () => {
    const part = parseMessage('Subject: Hello\n World\n\nbody\n');

    expect(part.headers[0]).toEqual({ name: 'Subject', value: 'Hello\n World' });
    expect(getHeader(part, 'subject')).toBe('Hello World');
  });
});

describe('header encoding', () => {
  it('should quote ASCII parameter values', () => {
    expect(formatHeaderValue('attachment', { filename: 'my "logo".png' }))
      .toBe('attachment; filename="my \\"logo\\".png"');
  });

  it('should write non-ASCII parameter values in RFC 2231 form', () => {
    expect(formatHeaderValue('attachment', { filename: '日本.png' }))
      .toBe("attachment; filename*=utf-8''%E6%97%A5%E6%9C%AC.png");
  });

  it('should leave ASCII header text alone', () => {
    expect(encodeHeaderText('Sigmark 1.0.0')).toBe('Sigmark 1.0.0');
  });

  it('should encode non-ASCII header text as an encoded word', () => {
    expect(encodeHeaderText('Geändert')).toBe('=?utf-8?B?R2XDpG5kZXJ0?=');
  });

  it('should split long text into folded encoded words', () => {
    const text = 'é'.repeat(30);
    const words = encodeHeaderText(text).split('\n ');

    expect(words).toHaveLength(2);
    const decoded = words.map(w => Buffer.from(w.slice('=?utf-8?B?'.length, -2), 'base64').toString('utf-8'));
    expect(decoded).toEqual(['é'.repeat(22), 'é'.repeat(8)]);
  });
});

describe('transfer encodings', () => {
  it('should encode trailing spaces and 8-bit bytes as quoted-printable', () => {
    expect(encodeQuotedPrintable(Buffer.from('-- \nGrüße', 'utf-8'))).toBe('--=20\nGr=C3=BC=C3=9Fe');
  });

  it('should escape the equals sign', () => {
    expect(encodeQuotedPrintable(Buffer.from('a=b'))).toBe('a=3Db');
  });

  it('should insert soft line breaks at 76 columns', () => {
    const encoded = encodeQuotedPrintable(Buffer.from('a'.repeat(100)));

    expect(encoded).toBe('a'.repeat(75) + '=\n' + 'a'.repeat(25));
  });

  it('should decode quoted-printable with soft breaks', () => {
    expect(decodeQuotedPrintable('Gr=C3=BC=C3=9Fe=\n!').toString('utf-8')).toBe('Grüße!');
  });

  it('should wrap base64 at 76 columns', () => {
    const lines = encodeBase64(Buffer.alloc(100, 0)).split('\n');

    expect(lines.map(l => l.length)).toEqual([76, 60]);
  });
});

describe('parseMessage', () => {
  it('should parse multipart structure with preamble and epilogue', () => {
    const message = parseMessage(MULTIPART);

    expect(message.kind).toBe('multipart');
    if (message.kind !== 'multipart') return;
    expect(getBoundary(message)).toBe('b1');
    expect(message.preamble).toBe('Preamble text');
    expect(message.epilogue).toBe('Epilogue\n');
    expect(message.parts.map(getContentType)).toEqual(['text/plain', 'text/html']);
    expect(bodyOf(message.parts[0])).toBe('Hello');
  });

  it('should accept CRLF line endings', () => {
    const message = parseMessage(MULTIPART.replace(/\n/g, '\r\n'));

    expect(message.kind).toBe('multipart');
    if (message.kind !== 'multipart') return;
    expect(message.parts).toHaveLength(2);
    expect(bodyOf(message.parts[1])).toBe('<p>Hi</p>');
  });

  it('should keep the mbox From line', () => {
    const message = parseMessage('From sender@example.com Mon Jan  1 00:00:00 2024\nSubject: x\n\nbody\n');

    expect(message.unixFrom).toBe('sender@example.com Mon Jan  1 00:00:00 2024');
    expect(message.headers).toEqual([{ name: 'Subject', value: 'x' }]);
  });

  it('should decode base64 and quoted-printable leaves', () => {
    const b64 = parseMessage('Content-Transfer-Encoding: base64\n\nSGVsbG8=\n');
    const qp = parseMessage('Content-Transfer-Encoding: quoted-printable\n\nA=3DB\n');

    expect(bodyOf(b64)).toBe('Hello');
    expect(bodyOf(qp)).toBe('A=B\n');
  });

  it('should preserve duplicate headers in order', () => {
    const message = parseMessage('Received: one\nReceived: two\nSubject: x\n\nbody\n');

    expect(message.headers.map(h => h.value)).toEqual(['one', 'two', 'x']);
  });

  it('should reject malformed header lines', () => {
    expect(() => parseMessage('Subject: ok\nthis is not a header\n\nbody\n')).toThrow(DecodeError);
  });

  it('should reject multiparts without a boundary', () => {
    expect(() => parseMessage('Content-Type: multipart/mixed\n\nbody\n')).toThrow(DecodeError);
  });
});

describe('serializeMessage', () => {
  it('should reproduce a parsed message exactly', () => {
    const output = serializeMessage(parseMessage(MULTIPART), { eol: '\n' });

    expect(output.toString('latin1')).toBe(MULTIPART);
  });

  it('should convert line endings to CRLF', () => {
    const output = serializeMessage(parseMessage(MULTIPART)).toString('latin1');

    expect(output).toBe(MULTIPART.replace(/\n/g, '\r\n'));
  });

  it('should write the mbox From line unless disabled', () => {
    const message = parseMessage('From sender@example.com\nSubject: x\n\nbody\n');

    expect(serializeMessage(message, { eol: '\n' }).toString()).toBe('From sender@example.com\nSubject: x\n\nbody\n');
    expect(serializeMessage(message, { eol: '\n', includeUnixFrom: false }).toString()).toBe('Subject: x\n\nbody\n');
  });

  it('should encode built text and image parts', () => {
    const text = serializeMessage(createTextPart('-- \n', 'plain', 'quoted-printable'), { eol: '\n' });
    const image = serializeMessage(
      createImagePart({
        contentId: '<part1@test.local>',
        data: Buffer.from('Hello'),
        filename: 'logo.png',
        subtype: 'png',
        source: 'logo.png',
      }),
      { eol: '\n' }
    );

    expect(text.toString()).toBe(
      'Content-Type: text/plain; charset="utf-8"\nContent-Transfer-Encoding: quoted-printable\n\n--=20\n'
    );
    expect(image.toString()).toBe([
      'Content-Type: image/png',
      'Content-Transfer-Encoding: base64',
      'Content-ID: <part1@test.local>',
      'Content-Disposition: attachment; filename="logo.png"',
      '',
      'SGVsbG8=',
    ].join('\n'));
  });

  it('should detect the input line ending', () => {
    expect(detectLineEnding('a\r\nb')).toBe('\r\n');
    expect(detectLineEnding(Buffer.from('a\nb'))).toBe('\n');
  });
});

describe('text decoding', () => {
  it('should decode legacy charsets through iconv', () => {
    expect(decodeText(Buffer.from([0x47, 0x72, 0xfc, 0xdf, 0x65]), 'iso-8859-1')).toBe('Grüße');
    expect(decodeText(Buffer.from([0x80, 0x20, 0x35]), 'windows-1252')).toBe('€ 5');
  });

  it('should decode a legacy text leaf by its declared charset', () => {
    const leaf: MimeLeaf = {
      kind: 'leaf',
      headers: [{ name: 'Content-Type', value: 'text/plain; charset=windows-1252' }],
      body: Buffer.from([0x93, 0x48, 0x69, 0x94, 0x0d, 0x0a]),
    };

    expect(decodeTextBody(leaf)).toBe('“Hi”\n');
  });

  it('should reject invalid UTF-8', () => {
    expect(() => decodeText(Buffer.from([0xff, 0xfe, 0x41]), 'utf-8')).toThrow(DecodeError);
  });

  it('should reject unknown charsets', () => {
    expect(() => decodeText(Buffer.from('x'), 'x-unknown-charset')).toThrow('Unknown charset');
  });

  it('should normalize line endings of text bodies', () => {
    const leaf: MimeLeaf = {
      kind: 'leaf',
      headers: [{ name: 'Content-Type', value: 'text/plain; charset=utf-8' }],
      body: Buffer.from('a\r\nb\r\n'),
    };

    expect(decodeTextBody(leaf)).toBe('a\nb\n');
  });
});
