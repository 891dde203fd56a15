export interface InstalledModel {
  name: string;
  sizeBytes: number;
  family?: string;
  parameterSize?: string;
  quantization?: string;
  modifiedAt?: string;
}

const DEFAULT_TAG = 'latest';

/**
 * Ollama stores untagged pulls as `<name>:latest`, so a bare name matches its
 * `:latest` entry. Tagged names must match exactly.
 */
export function findInstalledModel(model: string, installed: InstalledModel[]): InstalledModel | undefined {
  const exact = installed.find((m) => m.name === model);
  if (exact) return exact;
  if (model.includes(':')) return undefined;
  return installed.find((m) => m.name === `${model}:${DEFAULT_TAG}`);
}
