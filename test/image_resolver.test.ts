/**
 * Image Resolver Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  detectImageSubtype,
  findImageReferences,
  hasResolvableImages,
  localImagePath,
  resolveImages,
} from '../src/html/image_resolver.js';
import { ContentIdGenerator, stripAngleBrackets } from '../src/mime/content_id.js';
import { ImageResolutionError } from '../src/errors.js';

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d]);
const JPEG_BYTES = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46]);

describe('detectImageSubtype', () => {
  it('should recognize common formats by magic bytes', () => {
    expect(detectImageSubtype(PNG_BYTES)).toBe('png');
    expect(detectImageSubtype(JPEG_BYTES)).toBe('jpeg');
    expect(detectImageSubtype(Buffer.from('GIF89a\x01\x00', 'latin1'))).toBe('gif');
    expect(detectImageSubtype(Buffer.from('RIFF\x00\x00\x00\x00WEBPVP8 ', 'latin1'))).toBe('webp');
  });

  it('should recognize SVG documents', () => {
    const svg = Buffer.from('<?xml version="1.0"?>\n<svg xmlns="http://www.w3.org/2000/svg"></svg>');

    expect(detectImageSubtype(svg)).toBe('svg+xml');
  });

  it('should return undefined for unknown content', () => {
    expect(detectImageSubtype(Buffer.from('hello world'))).toBeUndefined();
  });
});

describe('findImageReferences', () => {
  it('should locate the tag and split it around the src value', () => {
    const html = '<p><img alt="Logo" src="logo.png" width="40"></p>';
    const refs = findImageReferences(html);

    expect(refs).toHaveLength(1);
    expect(refs[0]).toEqual({
      start: 3,
      end: 3 + '<img alt="Logo" src="logo.png" width="40">'.length,
      tag: '<img alt="Logo" src="logo.png" width="40">',
      source: 'logo.png',
      prefix: '<img alt="Logo" src="',
      suffix: '" width="40">',
    });
  });

  it('should not match tags broken across lines', () => {
    expect(findImageReferences('<img\nsrc="logo.png">')).toEqual([]);
    expect(findImageReferences('<img src=\n"logo.png">')).toEqual([]);
  });

  it('should find every tag', () => {
    const refs = findImageReferences('<img src="a.png"> and <img src="b.png">');

    expect(refs.map(r => r.source)).toEqual(['a.png', 'b.png']);
  });
});

describe('localImagePath', () => {
  it('should accept bare paths and file URIs', () => {
    expect(localImagePath('logo.png')).toBe('/logo.png');
    expect(localImagePath('file:logo.png')).toBe('/logo.png');
    expect(localImagePath('file:///srv/images/logo.png')).toBe('/srv/images/logo.png');
  });

  it('should drop query strings and decode escapes', () => {
    expect(localImagePath('logo.png?v=2')).toBe('/logo.png');
    expect(localImagePath('images/my%20logo.png')).toBe('/images/my logo.png');
  });

  it('should reject other schemes', () => {
    expect(localImagePath('http://example.com/logo.png')).toBeUndefined();
    expect(localImagePath('https://example.com/logo.png')).toBeUndefined();
    expect(localImagePath('cid:part1@example.com')).toBeUndefined();
    expect(localImagePath('data:image/png;base64,AAAA')).toBeUndefined();
  });
});

describe('hasResolvableImages', () => {
  it('should be true for a local reference', () => {
    expect(hasResolvableImages('<img src="logo.png">')).toBe(true);
  });

  it('should be false for remote references only', () => {
    expect(hasResolvableImages('<img src="https://example.com/logo.png">')).toBe(false);
  });

  it('should be false without images', () => {
    expect(hasResolvableImages('<p>No images</p>')).toBe(false);
  });
});

describe('resolveImages', () => {
  let imageDir: string;

  beforeAll(() => {
    imageDir = mkdtempSync(join(tmpdir(), 'sigmark-images-'));
    writeFileSync(join(imageDir, 'logo.png'), PNG_BYTES);
    writeFileSync(join(imageDir, 'photo.jpg'), JPEG_BYTES);
    writeFileSync(join(imageDir, 'notes.txt'), 'hello world');
  });

  afterAll(() => {
    rmSync(imageDir, { recursive: true, force: true });
  });

  it('should rewrite src to a cid reference and collect the attachment', () => {
    const result = resolveImages('<img src="logo.png" alt="x">', imageDir, new ContentIdGenerator('test.local'));

    expect(result.attachments).toHaveLength(1);
    const attachment = result.attachments[0];
    expect(attachment?.filename).toBe('logo.png');
    expect(attachment?.subtype).toBe('png');
    expect(attachment?.source).toBe('logo.png');
    expect(attachment?.data.equals(PNG_BYTES)).toBe(true);
    expect(attachment?.contentId).toMatch(/^<part1\.\d+\.[0-9a-f]{12}@test\.local>$/);
    expect(result.html).toBe(`<img src="cid:${stripAngleBrackets(attachment?.contentId ?? '')}" alt="x">`);
  });

  it('should leave remote images untouched', () => {
    const html = '<img src="https://example.com/a.png"><img src="photo.jpg">';
    const result = resolveImages(html, imageDir, new ContentIdGenerator('test.local'));

    expect(result.attachments.map(a => a.subtype)).toEqual(['jpeg']);
    expect(result.html.startsWith('<img src="https://example.com/a.png"><img src="cid:part1.')).toBe(true);
  });

  it('should look files up by basename only', () => {
    const result = resolveImages('<img src="../../etc/logo.png">', imageDir, new ContentIdGenerator('test.local'));

    expect(result.attachments[0]?.filename).toBe('logo.png');
  });

  it('should mint distinct content ids for each reference', () => {
    const result = resolveImages(
      '<img src="logo.png"><img src="logo.png">',
      imageDir,
      new ContentIdGenerator('test.local')
    );

    const ids = result.attachments.map(a => a.contentId);
    expect(ids).toHaveLength(2);
    expect(ids[0]).not.toBe(ids[1]);
    expect(ids[1]).toMatch(/^<part2\./);
  });

  it('should fail for a missing file', () => {
    const run = () => resolveImages('<img src="missing.png">', imageDir, new ContentIdGenerator('test.local'));

    expect(run).toThrow(ImageResolutionError);
    try {
      run();
    } catch (error) {
      expect(error).toBeInstanceOf(ImageResolutionError);
      if (error instanceof ImageResolutionError) {
        expect(error.source).toBe('missing.png');
        expect(error.path).toBe(join(imageDir, 'missing.png'));
        expect(error.code).toBe('IMAGE_UNRESOLVABLE');
      }
    }
  });

  it('should fail for files that are not images', () => {
    expect(() => resolveImages('<img src="notes.txt">', imageDir, new ContentIdGenerator('test.local')))
      .toThrow('unrecognized image format');
  });
});
