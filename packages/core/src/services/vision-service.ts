import {
  encodeImage,
  expandImageInputs,
  imageStem,
  inspectImage,
  pathExists,
  readSidecarPrompt,
} from '../domain/vision/image-file.js';
import { DEFAULT_IMAGE_PROMPT } from '../domain/vision/prompts.js';
import type { VisionResult } from '../domain/vision/vision-result.js';
import type { InferenceGateway } from '../ports/inference-gateway.js';
import type { VisionEvents } from '../ports/vision-events.js';
import type { VisionResultRepository } from '../ports/vision-result-repository.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { MODEL_NOT_INSTALLED } from './benchmark-service.js';
import { ModelInventoryService } from './model-inventory-service.js';

const log = createLogger('vision-service');

export interface VisionInput {
  models: string[];
  /** Image files or directories to search. */
  inputs: string[];
  /** Overrides sidecar prompt files and the built-in prompt. */
  prompt?: string;
}

export interface VisionDeps {
  gateway: InferenceGateway;
  repository: VisionResultRepository;
  events: VisionEvents;
  now?: () => Date;
}

/**
 * Sends each image to each model and stores the response with the server's
 * timing metadata. A failed request is recorded as an error result and the
 * batch carries on.
 */
export class VisionService {
  private readonly inventory: ModelInventoryService;
  private readonly now: () => Date;

  constructor(private deps: VisionDeps) {
    this.inventory = new ModelInventoryService(deps.gateway);
    this.now = deps.now ?? (() => new Date());
  }

  async process(input: VisionInput): Promise<VisionResult[]> {
    if (input.models.length === 0) throw new ConfigError('At least one model is required');

    const images = await expandImageInputs(input.inputs);
    if (images.length === 0) throw new ConfigError('No images found to process');

    const { installed, missing } = await this.inventory.check(input.models);
    for (const model of missing) this.deps.events.onModelSkipped(model, MODEL_NOT_INSTALLED);
    const models = input.models.filter((m) => installed.has(m));

    const results: VisionResult[] = [];
    for (const imagePath of images) {
      if (!(await pathExists(imagePath))) {
        this.deps.events.onImageSkipped(imagePath, 'Image not found');
        continue;
      }

      const check = await inspectImage(imagePath);
      if (!check.valid) {
        this.deps.events.onImageSkipped(imagePath, `Invalid image type: ${check.reason}`);
        continue;
      }

      const prompt = input.prompt || (await readSidecarPrompt(imagePath)) || DEFAULT_IMAGE_PROMPT;
      const image = imageStem(imagePath);
      const encoded = await encodeImage(imagePath);

      for (const model of models) {
        this.deps.events.onModelStart(model, image);
        const base = { model, image, imageType: check.type };

        try {
          const chat = await this.deps.gateway.chat({ model, prompt, images: [encoded] });
          const result: VisionResult = {
            timestamp: this.now().toISOString(),
            ...base,
            response: chat.content,
            metadata: {
              totalDuration: chat.timings.totalDurationNs,
              loadDuration: chat.timings.loadDurationNs,
              evalDuration: chat.timings.evalDurationNs,
              evalCount: chat.timings.evalCount,
            },
          };
          const filePath = await this.deps.repository.save(result);
          this.deps.events.onResultSaved(result, filePath);
          results.push(result);
        } catch (err) {
          log.warn(`process: ${model} failed on ${image}:`, errorMessage(err));
          const result: VisionResult = {
            timestamp: this.now().toISOString(),
            ...base,
            error: errorMessage(err),
          };
          const filePath = await this.deps.repository.save(result);
          this.deps.events.onResultFailed(result, filePath);
          results.push(result);
        }
      }
    }

    return results;
  }
}
