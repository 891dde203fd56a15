export class SpeedbenchError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'SpeedbenchError';
  }
}

export class ConfigError extends SpeedbenchError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class InferenceError extends SpeedbenchError {
  constructor(
    message: string,
    public readonly host: string,
    public readonly status?: number,
  ) {
    super(message, 'INFERENCE_ERROR');
    this.name = 'InferenceError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
