export interface BenchmarkPrefs {
  host?: string;
  prompt?: string;
  runs?: number;
  timeoutMs?: number;
}

export interface ConfigStore {
  getBenchmarkPrefs(): Promise<BenchmarkPrefs>;
  saveBenchmarkPrefs(prefs: BenchmarkPrefs): Promise<void>;
}
