import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { BenchmarkPrefs, ConfigStore } from '../ports/config-store.js';

// Unknown top-level keys are preserved on write.
type Preferences = Record<string, unknown>;

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function sanitizePrefs(value: unknown): BenchmarkPrefs {
  if (typeof value !== 'object' || value === null) return {};
  const raw = value as Record<string, unknown>;
  const prefs: BenchmarkPrefs = {};
  if (typeof raw.host === 'string' && raw.host) prefs.host = raw.host;
  if (typeof raw.prompt === 'string' && raw.prompt) prefs.prompt = raw.prompt;
  if (isNonNegativeInteger(raw.runs) && raw.runs > 0) prefs.runs = raw.runs;
  if (isNonNegativeInteger(raw.timeoutMs)) prefs.timeoutMs = raw.timeoutMs;
  return prefs;
}

export class JsonConfigStore implements ConfigStore {
  constructor(private readonly configDir: string) {}

  get prefsPath(): string {
    return join(this.configDir, 'preferences.json');
  }

  private async readPrefs(): Promise<Preferences> {
    try {
      const data = await readFile(this.prefsPath, 'utf-8');
      const parsed: unknown = JSON.parse(data);
      return typeof parsed === 'object' && parsed !== null ? (parsed as Preferences) : {};
    } catch {
      return {};
    }
  }

  private async writePrefs(prefs: Preferences): Promise<void> {
    await mkdir(this.configDir, { recursive: true });
    await writeFile(this.prefsPath, JSON.stringify(prefs, null, 2), 'utf-8');
  }

  async getBenchmarkPrefs(): Promise<BenchmarkPrefs> {
    const prefs = await this.readPrefs();
    return sanitizePrefs(prefs.benchmark);
  }

  async saveBenchmarkPrefs(benchmark: BenchmarkPrefs): Promise<void> {
    const prefs = await this.readPrefs();
    prefs.benchmark = benchmark;
    await this.writePrefs(prefs);
  }
}
