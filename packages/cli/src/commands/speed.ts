import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import React from 'react';
import { render as inkRender } from 'ink';
import type { Command } from 'commander';
import {
  BenchmarkService,
  ConfigService,
  DEFAULT_PROMPT,
  JsonConfigStore,
  OllamaGateway,
  errorMessage,
  setLogLevel,
  type BenchmarkConfig,
  type BenchmarkEvents,
  type BenchmarkReport,
  type ConfigStore,
  type InferenceGateway,
} from '@speedbench/core';
import { createCallbackEventBridge } from '../adapters/callback-event-bridge.js';
import { consoleSink, type OutputSink } from '../adapters/output-sink.js';
import { getConfigDir } from '../adapters/xdg-paths.js';
import { createFormatter, type FormatName } from '../formatters/index.js';
import { App } from '../ui/App.js';
import {
  benchmarkReducer,
  createBenchmarkHandlers,
  initialState,
  type Action,
  type BenchmarkState,
} from '../ui/state/benchmark-state.js';
import { parseFormat, parseNonNegativeInt, parsePositiveInt } from './options.js';

export interface SpeedOptions {
  models: string[];
  prompt?: string;
  runs?: number;
  host?: string;
  timeout?: number;
  format?: FormatName;
  json?: boolean;
  output?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export interface SpeedDeps {
  configStore?: ConfigStore;
  createGateway?: (config: BenchmarkConfig) => InferenceGateway;
  sink?: OutputSink;
  isTTY?: boolean;
}

function resolveFormat(opts: SpeedOptions, isTTY: boolean): FormatName {
  if (opts.json) return 'json';
  const format = opts.format ?? 'interactive';
  if (format === 'interactive' && (!isTTY || opts.quiet)) return 'plain';
  return format;
}

async function saveReport(path: string, report: BenchmarkReport): Promise<string> {
  const target = resolve(path);
  await writeFile(target, JSON.stringify(report, null, 2), 'utf-8');
  return target;
}

/** Runs the benchmark and returns the process exit code. */
export async function executeSpeed(opts: SpeedOptions, deps: SpeedDeps = {}): Promise<number> {
  if (opts.verbose) setLogLevel('debug');
  if (opts.quiet) setLogLevel('error');

  const sink = deps.sink ?? consoleSink;
  const format = resolveFormat(opts, deps.isTTY ?? Boolean(process.stdout.isTTY));

  const configStore = deps.configStore ?? new JsonConfigStore(getConfigDir());
  const configService = new ConfigService(configStore);
  const config = await configService.resolve({
    host: opts.host,
    prompt: opts.prompt,
    runs: opts.runs,
    timeoutMs: opts.timeout,
  });

  const gateway = deps.createGateway?.(config) ?? new OllamaGateway(config.host, { timeoutMs: config.timeoutMs });
  const input = { models: [...new Set(opts.models)], prompt: config.prompt, runs: config.runs };

  // --- Interactive mode: Ink UI ---
  if (format === 'interactive') {
    if (!opts.verbose) setLogLevel('error');

    let state: BenchmarkState = benchmarkReducer(initialState, { type: 'INIT', models: input.models, runs: input.runs });
    const ink = inkRender(React.createElement(App, { state, prompt: input.prompt }));
    const dispatch = (action: Action) => {
      state = benchmarkReducer(state, action);
      ink.rerender(React.createElement(App, { state, prompt: input.prompt }));
    };

    const service = new BenchmarkService({
      gateway,
      events: createCallbackEventBridge(createBenchmarkHandlers(dispatch)),
    });

    let exitCode = 0;
    try {
      const report = await service.run(input);
      if (opts.output) {
        const target = await saveReport(opts.output, report);
        sink.error(`Report saved to: ${target}`);
      }
    } catch (err) {
      dispatch({ type: 'ERROR', error: errorMessage(err) });
      exitCode = 1;
    } finally {
      ink.unmount();
      await ink.waitUntilExit();
    }
    return exitCode;
  }

  // --- Non-interactive mode: plain / md / json ---
  const formatter = createFormatter(format, sink);
  const events: BenchmarkEvents = createCallbackEventBridge({
    onModelSkipped: (model, reason) => {
      if (format === 'plain' && !opts.quiet) sink.error(`Skipping ${model}: ${reason}`);
    },
  });
  const service = new BenchmarkService({ gateway, events });

  try {
    const report = await service.run(input);
    formatter.renderComplete(report);
    if (opts.output) {
      const target = await saveReport(opts.output, report);
      if (format !== 'json') sink.error(`Report saved to: ${target}`);
    }
    return 0;
  } catch (err) {
    formatter.renderError(errorMessage(err));
    return 1;
  }
}

export function registerSpeedCommand(program: Command): void {
  program
    .command('speed')
    .description('Measure generation throughput and time to first token')
    .requiredOption('-m, --models <names...>', 'Models to benchmark (e.g. llama3 mistral:7b)')
    .option('-p, --prompt <text>', `Prompt to use for generation (default: "${DEFAULT_PROMPT}")`)
    .option('-n, --runs <count>', 'Number of runs per model (default: 1)', parsePositiveInt)
    .option('--host <url>', 'Inference server URL (default: $OLLAMA_HOST or http://127.0.0.1:11434)')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds, 0 for none', parseNonNegativeInt)
    .option('--format <type>', 'Output format: interactive (default), plain, md, json', parseFormat)
    .option('--json', 'Output the report as JSON to stdout')
    .option('-o, --output <file>', 'Also write the JSON report to a file')
    .option('--verbose', 'Debug logging')
    .option('--quiet', 'Minimal output')
    .action(async (opts: SpeedOptions) => {
      const code = await executeSpeed(opts);
      if (code !== 0) process.exit(code);
    });
}
