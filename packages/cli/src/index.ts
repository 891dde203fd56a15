import {
  BenchmarkService,
  ConfigService,
  JsonConfigStore,
  OllamaGateway,
  type BenchmarkEvents,
  type BenchmarkReport,
} from '@speedbench/core';
import { createCallbackEventBridge, type EventHandler } from './adapters/callback-event-bridge.js';
import { getConfigDir } from './adapters/xdg-paths.js';

export interface SpeedbenchOptions {
  models: string[];
  prompt?: string;
  runs?: number;
  host?: string;
  timeoutMs?: number;
  onProgress?: EventHandler;
}

/**
 * High-level convenience function for running a benchmark.
 * Suitable for use as a programmatic API.
 */
export async function benchmark(options: SpeedbenchOptions): Promise<BenchmarkReport> {
  const configService = new ConfigService(new JsonConfigStore(getConfigDir()));
  const config = await configService.resolve({
    host: options.host,
    prompt: options.prompt,
    runs: options.runs,
    timeoutMs: options.timeoutMs,
  });

  const events: BenchmarkEvents = createCallbackEventBridge(options.onProgress ?? {});
  const service = new BenchmarkService({
    gateway: new OllamaGateway(config.host, { timeoutMs: config.timeoutMs }),
    events,
  });

  return service.run({ models: options.models, prompt: config.prompt, runs: config.runs });
}

export { createProgram } from './program.js';
export type { EventHandler } from './adapters/callback-event-bridge.js';

// Re-export everything from core for advanced usage
export * from '@speedbench/core';
