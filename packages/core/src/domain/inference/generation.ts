/** Durations the server reports on the final chunk, in nanoseconds. */
export interface ServerTimings {
  totalDurationNs?: number;
  loadDurationNs?: number;
  promptEvalCount?: number;
  promptEvalDurationNs?: number;
  evalCount?: number;
  evalDurationNs?: number;
}

export interface GenerationRequest {
  model: string;
  prompt: string;
}

export interface GenerationChunk {
  text: string;
  done: boolean;
  /** Only present on the final chunk. */
  timings?: ServerTimings | null;
  /** Server-side failure reported inside the stream. */
  error?: string | null;
  rawLine: string;
}

export interface ChatRequest {
  model: string;
  prompt: string;
  /** Base64-encoded image payloads. */
  images?: string[];
}

export interface ChatResult {
  content: string;
  timings: ServerTimings;
}
