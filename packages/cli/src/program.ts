import { Command, type OutputConfiguration } from 'commander';
import { registerConfigCommand } from './commands/config.js';
import { registerImagesCommand } from './commands/images.js';
import { registerModelsCommand } from './commands/models.js';
import { registerSpeedCommand } from './commands/speed.js';

export interface ProgramOptions {
  /** Throw a CommanderError instead of exiting (tests). */
  exitOverride?: boolean;
  output?: OutputConfiguration;
}

export function createProgram(version: string, options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('speedbench')
    .description('Throughput and latency benchmarks for locally hosted LLM runtimes')
    .version(version);

  // Set before registering commands so subcommands inherit them.
  if (options.exitOverride) program.exitOverride();
  if (options.output) program.configureOutput(options.output);

  registerSpeedCommand(program);
  registerImagesCommand(program);
  registerModelsCommand(program);
  registerConfigCommand(program);
  return program;
}
