import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { VisionService } from './vision-service.js';
import { MODEL_NOT_INSTALLED } from './benchmark-service.js';
import { JsonVisionResultRepository } from '../adapters/json-vision-result-repository.js';
import { DEFAULT_IMAGE_PROMPT } from '../domain/vision/prompts.js';
import type { VisionEvents } from '../ports/vision-events.js';
import { InferenceError } from '../shared/errors.js';
import { FakeClock } from '../testing/fake-clock.js';
import { FakeInferenceGateway } from '../testing/fake-inference-gateway.js';

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 1, 2, 3]);
const JPEG_BYTES = Buffer.from([0xff, 0xd8, 0xff, 0xdb, 4, 5]);
const NOW = new Date('2024-05-01T12:00:00.000Z');

function recordingEvents() {
  return {
    onImageSkipped: vi.fn<VisionEvents['onImageSkipped']>(),
    onModelSkipped: vi.fn<VisionEvents['onModelSkipped']>(),
    onModelStart: vi.fn<VisionEvents['onModelStart']>(),
    onResultSaved: vi.fn<VisionEvents['onResultSaved']>(),
    onResultFailed: vi.fn<VisionEvents['onResultFailed']>(),
  } satisfies VisionEvents;
}

describe('VisionService', () => {
  let dir: string;
  let imagesDir: string;
  let dataDir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'speedbench-vision-'));
    imagesDir = join(dir, 'images');
    dataDir = join(dir, 'data');
    await mkdir(join(imagesDir, 'sub'), { recursive: true });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function setup(chat: (prompt: string) => string | Error) {
    const gateway = new FakeInferenceGateway({
      installed: ['llava:latest'],
      clock: new FakeClock(),
      chat: (req) => {
        const outcome = chat(req.prompt);
        return outcome instanceof Error
          ? outcome
          : { content: outcome, timings: { totalDurationNs: 900, loadDurationNs: 100, evalDurationNs: 700, evalCount: 12 } };
      },
    });
    const events = recordingEvents();
    const service = new VisionService({
      gateway,
      repository: new JsonVisionResultRepository(dataDir),
      events,
      now: () => NOW,
    });
    return { gateway, events, service };
  }

  it('processes every valid image with every installed model', async () => {
    await writeFile(join(imagesDir, 'a.png'), PNG_BYTES);
    await writeFile(join(imagesDir, 'a_prompt.md'), '  Extract the table  \n');
    await writeFile(join(imagesDir, 'c.jpg'), 'not an image');
    await writeFile(join(imagesDir, 'sub', 'b.JPG'), JPEG_BYTES);
    const { gateway, events, service } = setup((prompt) =>
      prompt === DEFAULT_IMAGE_PROMPT ? new InferenceError('model crashed', 'http://fake-ollama:11434', 500) : '| x |',
    );

    const results = await service.process({ models: ['llava', 'ghost'], inputs: [imagesDir] });

    expect(events.onModelSkipped).toHaveBeenCalledWith('ghost', MODEL_NOT_INSTALLED);
    expect(events.onImageSkipped).toHaveBeenCalledWith(
      join(imagesDir, 'c.jpg'),
      'Invalid image type: Not a PNG/JPEG image',
    );
    expect(gateway.chatCalls.map((c) => c.prompt)).toEqual(['Extract the table', DEFAULT_IMAGE_PROMPT]);
    expect(gateway.chatCalls[0].images).toEqual([PNG_BYTES.toString('base64')]);
    expect(results).toHaveLength(2);

    const saved: unknown = JSON.parse(await readFile(join(dataDir, 'images', 'a', 'llava.json'), 'utf-8'));
    expect(saved).toEqual({
      timestamp: '2024-05-01T12:00:00.000Z',
      model: 'llava',
      image: 'a',
      imageType: 'PNG',
      response: '| x |',
      metadata: { totalDuration: 900, loadDuration: 100, evalDuration: 700, evalCount: 12 },
    });

    const failed: unknown = JSON.parse(await readFile(join(dataDir, 'images', 'b', 'llava.json'), 'utf-8'));
    expect(failed).toEqual({
      timestamp: '2024-05-01T12:00:00.000Z',
      model: 'llava',
      image: 'b',
      imageType: 'JPEG',
      error: 'model crashed',
    });
    expect(events.onResultSaved).toHaveBeenCalledTimes(1);
    expect(events.onResultFailed).toHaveBeenCalledTimes(1);
  });

  it('lets an explicit prompt override sidecar files', async () => {
    await writeFile(join(imagesDir, 'a.png'), PNG_BYTES);
    await writeFile(join(imagesDir, 'a_prompt.md'), 'sidecar');
    const { gateway, service } = setup(() => 'ok');

    await service.process({ models: ['llava'], inputs: [join(imagesDir, 'a.png')], prompt: 'Transcribe' });

    expect(gateway.chatCalls.map((c) => c.prompt)).toEqual(['Transcribe']);
  });

  it('skips files that do not exist', async () => {
    const { events, gateway, service } = setup(() => 'ok');
    const missing = join(imagesDir, 'missing.png');

    const results = await service.process({ models: ['llava'], inputs: [missing] });

    expect(results).toEqual([]);
    expect(events.onImageSkipped).toHaveBeenCalledWith(missing, 'Image not found');
    expect(gateway.chatCalls).toHaveLength(0);
  });

  it('refuses to run without images', async () => {
    const { service } = setup(() => 'ok');
    await expect(service.process({ models: ['llava'], inputs: [join(imagesDir, 'sub')] })).rejects.toThrow(
      'No images found to process',
    );
  });
});
