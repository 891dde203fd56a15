import type { Command } from 'commander';
import { ConfigService, JsonConfigStore, normalizeHost, type BenchmarkPrefs } from '@speedbench/core';
import { getConfigDir } from '../adapters/xdg-paths.js';

const VALID_KEYS = ['host', 'prompt', 'runs', 'timeout'] as const;
type ConfigKey = (typeof VALID_KEYS)[number];

function isConfigKey(key: string): key is ConfigKey {
  return VALID_KEYS.some((k) => k === key);
}

/** Converts a `config set` value into a preferences update, or an error message. */
export function parseConfigValue(key: ConfigKey, value: string): BenchmarkPrefs | string {
  switch (key) {
    case 'host':
      return { host: normalizeHost(value) };
    case 'prompt':
      return value.trim() ? { prompt: value } : 'Prompt must not be empty.';
    case 'runs': {
      const runs = Number(value);
      return Number.isInteger(runs) && runs >= 1 ? { runs } : 'runs must be a positive integer.';
    }
    case 'timeout': {
      const timeoutMs = Number(value);
      return Number.isInteger(timeoutMs) && timeoutMs >= 0
        ? { timeoutMs }
        : 'timeout must be a non-negative number of milliseconds.';
    }
  }
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Manage configuration');

  config
    .command('show')
    .description('Show the resolved configuration')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      const configStore = new JsonConfigStore(getConfigDir());
      const resolved = await new ConfigService(configStore).resolve();
      const display = { ...resolved, configFile: configStore.prefsPath };

      if (opts.json) {
        console.log(JSON.stringify(display, null, 2));
      } else {
        console.log(`\n  Configuration:`);
        console.log(`  Host:           ${display.host}`);
        console.log(`  Prompt:         ${display.prompt}`);
        console.log(`  Runs:           ${display.runs}`);
        console.log(`  Timeout:        ${display.timeoutMs > 0 ? `${display.timeoutMs} ms` : 'none'}`);
        console.log(`  Config File:    ${display.configFile}`);
        console.log();
      }
    });

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', `Configuration key (${VALID_KEYS.join(', ')})`)
    .argument('<value>', 'Value to set')
    .action(async (key: string, value: string) => {
      if (!isConfigKey(key)) {
        console.error(`Unknown config key: ${key}. Valid keys: ${VALID_KEYS.join(', ')}`);
        process.exit(1);
      }
      const update = parseConfigValue(key, value);
      if (typeof update === 'string') {
        console.error(update);
        process.exit(1);
      }
      await new ConfigService(new JsonConfigStore(getConfigDir())).savePrefs(update);
      console.log(`${key} set to: ${Object.values(update).join('')}`);
    });

  config
    .command('reset')
    .description('Reset configuration to defaults')
    .action(async () => {
      await new ConfigService(new JsonConfigStore(getConfigDir())).reset();
      console.log('Configuration reset to defaults.');
    });

  config
    .command('path')
    .description('Print the config file location')
    .action(() => {
      console.log(new JsonConfigStore(getConfigDir()).prefsPath);
    });

  // Default: show config when no subcommand
  config.action(async () => {
    await config.commands.find((c) => c.name() === 'show')?.parseAsync([], { from: 'user' });
  });
}
