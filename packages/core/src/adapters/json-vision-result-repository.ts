import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { VisionResult } from '../domain/vision/vision-result.js';
import type { VisionResultRepository } from '../ports/vision-result-repository.js';

/** `llava:13b` → `llava_13b`, `library/llava` → `library_llava`. */
export function modelFileName(model: string): string {
  return `${model.replace(/[/\\:]/g, '_')}.json`;
}

/** Writes one pretty-printed JSON file per (image, model) under `<dataDir>/images/<image>/`. */
export class JsonVisionResultRepository implements VisionResultRepository {
  constructor(private readonly dataDir: string) {}

  async save(result: VisionResult): Promise<string> {
    const dir = join(this.dataDir, 'images', result.image);
    await mkdir(dir, { recursive: true });
    const filePath = join(dir, modelFileName(result.model));
    await writeFile(filePath, JSON.stringify(result, null, 2), 'utf-8');
    return filePath;
  }
}
