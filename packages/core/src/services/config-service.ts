import {
  DEFAULT_HOST,
  DEFAULT_PROMPT,
  DEFAULT_RUNS,
  DEFAULT_TIMEOUT_MS,
  normalizeHost,
  type BenchmarkConfig,
} from '../domain/benchmark/benchmark-config.js';
import type { BenchmarkPrefs, ConfigStore } from '../ports/config-store.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('config-service');

export type ConfigOverrides = Partial<BenchmarkConfig>;

function parseInteger(name: string, raw: string | undefined, min: number): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    log.warn(`ignoring ${name}=${JSON.stringify(raw)}: expected an integer >= ${min}`);
    return undefined;
  }
  return value;
}

export class ConfigService {
  constructor(
    private configStore: ConfigStore,
    private env: NodeJS.ProcessEnv = process.env,
  ) {}

  /** Flag overrides win over environment, environment over the preferences file. */
  async resolve(overrides: ConfigOverrides = {}): Promise<BenchmarkConfig> {
    const prefs = await this.configStore.getBenchmarkPrefs();

    const envHost = this.env.OLLAMA_HOST || undefined;
    const envPrompt = this.env.SPEEDBENCH_PROMPT || undefined;
    const envRuns = parseInteger('SPEEDBENCH_RUNS', this.env.SPEEDBENCH_RUNS, 1);
    const envTimeout = parseInteger('SPEEDBENCH_TIMEOUT_MS', this.env.SPEEDBENCH_TIMEOUT_MS, 0);

    return {
      host: normalizeHost(overrides.host ?? envHost ?? prefs.host ?? DEFAULT_HOST),
      prompt: overrides.prompt ?? envPrompt ?? prefs.prompt ?? DEFAULT_PROMPT,
      runs: overrides.runs ?? envRuns ?? prefs.runs ?? DEFAULT_RUNS,
      timeoutMs: overrides.timeoutMs ?? envTimeout ?? prefs.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    };
  }

  async savePrefs(update: BenchmarkPrefs): Promise<void> {
    const current = await this.configStore.getBenchmarkPrefs();
    await this.configStore.saveBenchmarkPrefs({ ...current, ...update });
  }

  async reset(): Promise<void> {
    await this.configStore.saveBenchmarkPrefs({});
  }
}
