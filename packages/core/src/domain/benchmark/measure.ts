import type { GenerationChunk, ServerTimings } from '../inference/generation.js';
import type { Clock } from '../../ports/clock.js';
import type { InferenceGateway } from '../../ports/inference-gateway.js';
import type { BenchmarkSample } from './sample.js';

export interface MeasureRequest {
  model: string;
  prompt: string;
  run: number;
}

/**
 * Times one streamed generation: request start, first chunk with text, and
 * stream end. The token count prefers the server's `eval_count`; without it,
 * every non-empty chunk counts as one token.
 */
export async function measureGeneration(
  gateway: InferenceGateway,
  clock: Clock,
  request: MeasureRequest,
): Promise<BenchmarkSample> {
  const seen: { firstTokenAt: number | null; chunkCount: number; server: ServerTimings | null } = {
    firstTokenAt: null,
    chunkCount: 0,
    server: null,
  };

  const startedAt = clock.now();
  const outcome = await gateway.generateStream(
    { model: request.model, prompt: request.prompt },
    (chunk: GenerationChunk) => {
      if (chunk.text) {
        seen.chunkCount++;
        if (seen.firstTokenAt === null) seen.firstTokenAt = clock.now();
      }
      if (chunk.done && chunk.timings) seen.server = chunk.timings;
    },
  );
  const endedAt = clock.now();

  const server = seen.server ?? outcome.timings;
  const tokenCount = server?.evalCount ?? seen.chunkCount;

  return {
    model: request.model,
    prompt: request.prompt,
    run: request.run,
    startedAt,
    firstTokenAt: seen.firstTokenAt,
    endedAt,
    tokenCount,
    chunkCount: seen.chunkCount,
    server,
  };
}
