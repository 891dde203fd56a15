import { randomUUID } from 'node:crypto';
import type { BenchmarkReport } from '../domain/benchmark/benchmark-report.js';
import { measureGeneration } from '../domain/benchmark/measure.js';
import type { BenchmarkSample } from '../domain/benchmark/sample.js';
import {
  runningMeanTokensPerSecond,
  skippedSummary,
  summarizeSamples,
  type ModelSummary,
} from '../domain/benchmark/statistics.js';
import { systemClock } from '../adapters/system-clock.js';
import type { BenchmarkEvents } from '../ports/benchmark-events.js';
import type { Clock } from '../ports/clock.js';
import type { InferenceGateway } from '../ports/inference-gateway.js';
import { ConfigError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { ModelInventoryService } from './model-inventory-service.js';

const log = createLogger('benchmark-service');

export const MODEL_NOT_INSTALLED = 'Model not installed';

export interface BenchmarkInput {
  models: string[];
  prompt: string;
  runs: number;
}

export interface BenchmarkDeps {
  gateway: InferenceGateway;
  events: BenchmarkEvents;
  clock?: Clock;
}

function validate(input: BenchmarkInput): void {
  if (input.models.length === 0) throw new ConfigError('At least one model is required');
  if (!Number.isInteger(input.runs) || input.runs < 1) {
    throw new ConfigError(`Run count must be a positive integer, got ${input.runs}`);
  }
  if (!input.prompt.trim()) throw new ConfigError('Prompt must not be empty');
}

/**
 * Runs every distinct model `runs` times, one request at a time. The first failed
 * request aborts the whole benchmark.
 */
export class BenchmarkService {
  private readonly clock: Clock;
  private readonly inventory: ModelInventoryService;

  constructor(private deps: BenchmarkDeps) {
    this.clock = deps.clock ?? systemClock;
    this.inventory = new ModelInventoryService(deps.gateway);
  }

  async run(input: BenchmarkInput): Promise<BenchmarkReport> {
    const reportId = randomUUID();
    const { events } = this.deps;

    try {
      validate(input);
      const models = [...new Set(input.models)];
      log.info(`run: ${reportId} starting, ${models.length} models x ${input.runs} runs`);

      const { installed } = await this.inventory.check(models);
      const summaries: ModelSummary[] = [];

      for (const model of models) {
        if (!installed.has(model)) {
          log.warn(`run: ${model} is not installed on ${this.deps.gateway.host}`);
          events.onModelSkipped(model, MODEL_NOT_INSTALLED);
          summaries.push(skippedSummary(model, input.runs, MODEL_NOT_INSTALLED));
          continue;
        }

        events.onModelStart(model, input.runs);
        const samples: BenchmarkSample[] = [];
        for (let run = 1; run <= input.runs; run++) {
          const sample = await measureGeneration(this.deps.gateway, this.clock, {
            model,
            prompt: input.prompt,
            run,
          });
          samples.push(sample);
          events.onRunComplete(model, run, sample, runningMeanTokensPerSecond(samples));
        }

        const summary = summarizeSamples(model, input.runs, samples);
        log.debug(`run: ${model} mean ${summary.tokensPerSecond?.mean.toFixed(2)} tok/s`);
        events.onModelComplete(summary);
        summaries.push(summary);
      }

      const report: BenchmarkReport = {
        id: reportId,
        createdAt: new Date().toISOString(),
        host: this.deps.gateway.host,
        prompt: input.prompt,
        runs: input.runs,
        models: summaries,
      };
      events.onComplete(report);
      return report;
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      log.error(`run: benchmark ${reportId} failed:`, message);
      events.onError(message);
      throw err;
    }
  }
}
