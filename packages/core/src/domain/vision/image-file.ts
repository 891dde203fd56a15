import { open, readdir, readFile, stat, type FileHandle } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { createLogger } from '../../shared/logger.js';
import { PROMPT_SIDECAR_SUFFIX } from './prompts.js';

const log = createLogger('image-file');

export type ImageType = 'PNG' | 'JPEG';

export type ImageCheck =
  | { valid: true; type: ImageType }
  | { valid: false; reason: string };

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];
const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg']);

function startsWith(header: Uint8Array, signature: number[]): boolean {
  return header.length >= signature.length && signature.every((byte, i) => header[i] === byte);
}

export function detectImageType(header: Uint8Array): ImageCheck {
  if (startsWith(header, PNG_SIGNATURE)) return { valid: true, type: 'PNG' };
  if (startsWith(header, JPEG_SIGNATURE)) return { valid: true, type: 'JPEG' };
  return { valid: false, reason: 'Not a PNG/JPEG image' };
}

export async function inspectImage(path: string): Promise<ImageCheck> {
  let handle: FileHandle | undefined;
  try {
    handle = await open(path, 'r');
    const header = new Uint8Array(8);
    const { bytesRead } = await handle.read(header, 0, header.length, 0);
    return detectImageType(header.subarray(0, bytesRead));
  } catch (err) {
    return { valid: false, reason: `Error reading file: ${err instanceof Error ? err.message : String(err)}` };
  } finally {
    await handle?.close();
  }
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function walkImages(dir: string, out: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      await walkImages(full, out);
    } else if (entry.isFile() && IMAGE_EXTENSIONS.has(extname(entry.name).toLowerCase())) {
      out.push(full);
    }
  }
}

/** Directories expand to their images (recursively, sorted); anything else is passed through. */
export async function expandImageInputs(inputs: string[]): Promise<string[]> {
  const images: string[] = [];
  for (const input of inputs) {
    if (await isDirectory(input)) {
      const found: string[] = [];
      await walkImages(input, found);
      images.push(...found.sort());
    } else {
      images.push(input);
    }
  }
  return images;
}

export function imageStem(path: string): string {
  const name = basename(path);
  const ext = extname(name);
  return ext ? name.slice(0, -ext.length) : name;
}

export function sidecarPromptPath(imagePath: string): string {
  const ext = extname(imagePath);
  const base = ext ? imagePath.slice(0, -ext.length) : imagePath;
  return `${base}${PROMPT_SIDECAR_SUFFIX}`;
}

/** Returns the trimmed sidecar prompt, or null when there is none (or it is empty). */
export async function readSidecarPrompt(imagePath: string): Promise<string | null> {
  const path = sidecarPromptPath(imagePath);
  if (!(await pathExists(path))) return null;
  try {
    const text = (await readFile(path, 'utf-8')).trim();
    return text || null;
  } catch (err) {
    log.warn(`Failed to read prompt file ${path}:`, err instanceof Error ? err.message : String(err));
    return null;
  }
}

export async function encodeImage(path: string): Promise<string> {
  return (await readFile(path)).toString('base64');
}
