import { findInstalledModel, type InstalledModel } from '../domain/inference/installed-model.js';
import type { InferenceGateway } from '../ports/inference-gateway.js';

export class ModelInventoryService {
  constructor(private gateway: InferenceGateway) {}

  list(): Promise<InstalledModel[]> {
    return this.gateway.listModels();
  }

  /** Splits requested names into installed (resolved to their stored name) and missing. */
  async check(models: string[]): Promise<{ installed: Map<string, string>; missing: string[] }> {
    const available = await this.gateway.listModels();
    const installed = new Map<string, string>();
    const missing: string[] = [];
    for (const model of models) {
      const match = findInstalledModel(model, available);
      if (match) installed.set(model, match.name);
      else missing.push(model);
    }
    return { installed, missing };
  }
}
