import type { Command } from 'commander';
import {
  ConfigService,
  JsonConfigStore,
  ModelInventoryService,
  OllamaGateway,
  errorMessage,
  type BenchmarkConfig,
  type ConfigStore,
  type InferenceGateway,
  type InstalledModel,
} from '@speedbench/core';
import { consoleSink, type OutputSink } from '../adapters/output-sink.js';
import { getConfigDir } from '../adapters/xdg-paths.js';
import { formatBytes } from '../ui/format.js';

export interface ModelsOptions {
  host?: string;
  json?: boolean;
}

export interface ModelsDeps {
  configStore?: ConfigStore;
  createGateway?: (config: BenchmarkConfig) => InferenceGateway;
  sink?: OutputSink;
}

export function formatModelLine(model: InstalledModel): string {
  const details = [model.parameterSize, model.quantization].filter(Boolean).join(' ');
  return `  ${model.name.padEnd(40)} ${formatBytes(model.sizeBytes).padStart(9)}  ${details}`.trimEnd();
}

/** Lists the models installed on the server and returns the exit code. */
export async function executeModels(opts: ModelsOptions, deps: ModelsDeps = {}): Promise<number> {
  const sink = deps.sink ?? consoleSink;
  const configService = new ConfigService(deps.configStore ?? new JsonConfigStore(getConfigDir()));
  const config = await configService.resolve({ host: opts.host });
  const gateway = deps.createGateway?.(config) ?? new OllamaGateway(config.host, { timeoutMs: config.timeoutMs });

  let models: InstalledModel[];
  try {
    models = await new ModelInventoryService(gateway).list();
  } catch (err) {
    sink.error(`Error: ${errorMessage(err)}`);
    return 1;
  }

  if (opts.json) {
    sink.log(JSON.stringify(models, null, 2));
    return 0;
  }

  if (models.length === 0) {
    sink.log(`No models installed on ${config.host}.`);
    return 0;
  }

  sink.log(`\n  Models on ${config.host} (${models.length}):\n`);
  for (const m of models) sink.log(formatModelLine(m));
  sink.log('');
  return 0;
}

export function registerModelsCommand(program: Command): void {
  program
    .command('models')
    .description('List models installed on the inference server')
    .option('--host <url>', 'Inference server URL (default: $OLLAMA_HOST or http://127.0.0.1:11434)')
    .option('--json', 'Output as JSON')
    .action(async (opts: ModelsOptions) => {
      const code = await executeModels(opts);
      if (code !== 0) process.exit(code);
    });
}
