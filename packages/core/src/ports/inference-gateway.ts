import type {
  ChatRequest,
  ChatResult,
  GenerationChunk,
  GenerationRequest,
  ServerTimings,
} from '../domain/inference/generation.js';
import type { InstalledModel } from '../domain/inference/installed-model.js';

export interface GenerationOutcome {
  /** Timings from the final chunk, or null when the stream ended without one. */
  timings: ServerTimings | null;
  text: string;
}

export interface InferenceGateway {
  readonly host: string;

  listModels(): Promise<InstalledModel[]>;

  generateStream(
    request: GenerationRequest,
    onChunk: (chunk: GenerationChunk) => void,
  ): Promise<GenerationOutcome>;

  chat(request: ChatRequest): Promise<ChatResult>;
}
