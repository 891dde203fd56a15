import type { ModelSummary } from './statistics.js';

export interface BenchmarkReport {
  id: string;
  createdAt: string;
  host: string;
  prompt: string;
  runs: number;
  models: ModelSummary[];
}
