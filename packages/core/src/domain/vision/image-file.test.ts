import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  detectImageType,
  expandImageInputs,
  imageStem,
  inspectImage,
  readSidecarPrompt,
  sidecarPromptPath,
} from './image-file.js';

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0, 0, 0, 13]);
const JPEG_BYTES = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0, 16]);

describe('detectImageType', () => {
  it('recognizes PNG and JPEG signatures', () => {
    expect(detectImageType(PNG_BYTES)).toEqual({ valid: true, type: 'PNG' });
    expect(detectImageType(JPEG_BYTES)).toEqual({ valid: true, type: 'JPEG' });
  });

  it('rejects anything else, including truncated headers', () => {
    expect(detectImageType(Buffer.from('GIF89a'))).toEqual({ valid: false, reason: 'Not a PNG/JPEG image' });
    expect(detectImageType(PNG_BYTES.subarray(0, 4))).toEqual({ valid: false, reason: 'Not a PNG/JPEG image' });
  });
});

describe('image paths', () => {
  it('derives the stem and sidecar prompt path', () => {
    expect(imageStem('/data/scans/page-01.png')).toBe('page-01');
    expect(sidecarPromptPath('/data/scans/page-01.png')).toBe('/data/scans/page-01_prompt.md');
  });
});

describe('image files on disk', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'speedbench-images-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('expands directories recursively to sorted image files', async () => {
    await mkdir(join(dir, 'sub'));
    await writeFile(join(dir, 'b.png'), PNG_BYTES);
    await writeFile(join(dir, 'a.JPEG'), JPEG_BYTES);
    await writeFile(join(dir, 'notes.txt'), 'skip me');
    await writeFile(join(dir, 'sub', 'c.jpg'), JPEG_BYTES);

    const images = await expandImageInputs([dir, '/not/a/dir.png']);

    expect(images).toEqual([join(dir, 'a.JPEG'), join(dir, 'b.png'), join(dir, 'sub', 'c.jpg'), '/not/a/dir.png']);
  });

  it('inspects the file header rather than the extension', async () => {
    await writeFile(join(dir, 'fake.png'), 'plain text');
    await writeFile(join(dir, 'real.jpg'), JPEG_BYTES);

    expect(await inspectImage(join(dir, 'fake.png'))).toEqual({ valid: false, reason: 'Not a PNG/JPEG image' });
    expect(await inspectImage(join(dir, 'real.jpg'))).toEqual({ valid: true, type: 'JPEG' });
  });

  it('reads a trimmed sidecar prompt and treats an empty one as absent', async () => {
    await writeFile(join(dir, 'one_prompt.md'), '\n  List every heading.  \n');
    await writeFile(join(dir, 'two_prompt.md'), '   \n');

    expect(await readSidecarPrompt(join(dir, 'one.png'))).toBe('List every heading.');
    expect(await readSidecarPrompt(join(dir, 'two.png'))).toBeNull();
    expect(await readSidecarPrompt(join(dir, 'three.png'))).toBeNull();
  });
});
