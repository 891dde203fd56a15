import { basename, resolve } from 'node:path';
import type { Command } from 'commander';
import {
  ConfigService,
  JsonConfigStore,
  JsonVisionResultRepository,
  OllamaGateway,
  VisionService,
  errorMessage,
  setLogLevel,
  type BenchmarkConfig,
  type ConfigStore,
  type InferenceGateway,
  type VisionEvents,
} from '@speedbench/core';
import { consoleSink, type OutputSink } from '../adapters/output-sink.js';
import { getConfigDir, getDataDir } from '../adapters/xdg-paths.js';
import { parseNonNegativeInt } from './options.js';

export interface ImagesOptions {
  models: string[];
  images: string[];
  prompt?: string;
  dataDir?: string;
  host?: string;
  timeout?: number;
  verbose?: boolean;
}

export interface ImagesDeps {
  configStore?: ConfigStore;
  createGateway?: (config: BenchmarkConfig) => InferenceGateway;
  sink?: OutputSink;
}

function line(icon: string, label: string, width: number, message: string): string {
  return `${icon} | ${label.padEnd(width)} | ${message}`;
}

export function createVisionConsoleEvents(sink: OutputSink, width: number): VisionEvents {
  return {
    onImageSkipped: (imagePath, reason) => sink.log(line('🚫', basename(imagePath), width, reason)),
    onModelSkipped: (model, reason) => sink.log(line('🚫', model, width, reason)),
    onModelStart: () => {},
    onResultSaved: (result, filePath) =>
      sink.log(line('✅', result.model, width, `Save ${result.image} result to: ${filePath}`)),
    onResultFailed: (result) =>
      sink.log(line('⚠️', result.model, width, `Error while processing ${result.image}: ${result.error ?? 'unknown error'}`)),
  };
}

/** Sends images to multimodal models and stores each response as JSON. Returns the exit code. */
export async function executeImages(opts: ImagesOptions, deps: ImagesDeps = {}): Promise<number> {
  if (opts.verbose) setLogLevel('debug');
  const sink = deps.sink ?? consoleSink;

  const configService = new ConfigService(deps.configStore ?? new JsonConfigStore(getConfigDir()));
  const config = await configService.resolve({ host: opts.host, timeoutMs: opts.timeout });
  const gateway = deps.createGateway?.(config) ?? new OllamaGateway(config.host, { timeoutMs: config.timeoutMs });

  const width = Math.max(0, ...opts.models.map((m) => m.length));
  const service = new VisionService({
    gateway,
    repository: new JsonVisionResultRepository(resolve(opts.dataDir ?? getDataDir())),
    events: createVisionConsoleEvents(sink, width),
  });

  try {
    await service.process({ models: opts.models, inputs: opts.images, prompt: opts.prompt });
    return 0;
  } catch (err) {
    sink.error(`Error: ${errorMessage(err)}`);
    return 1;
  }
}

export function registerImagesCommand(program: Command): void {
  program
    .command('images')
    .description('Run images through multimodal models and save each response as JSON')
    .requiredOption('-m, --models <names...>', 'Multimodal models to use')
    .requiredOption('-i, --images <paths...>', 'Image files or folders to process')
    .option('-p, --prompt <text>', 'Prompt for every image (overrides <image>_prompt.md files)')
    .option('--data-dir <dir>', 'Directory results are written under (default: $XDG_DATA_HOME/speedbench)')
    .option('--host <url>', 'Inference server URL (default: $OLLAMA_HOST or http://127.0.0.1:11434)')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds, 0 for none', parseNonNegativeInt)
    .option('--verbose', 'Debug logging')
    .action(async (opts: ImagesOptions) => {
      const code = await executeImages(opts);
      if (code !== 0) process.exit(code);
    });
}
