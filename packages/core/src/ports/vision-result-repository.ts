import type { VisionResult } from '../domain/vision/vision-result.js';

export interface VisionResultRepository {
  /** Persists the result and returns the path it was written to. */
  save(result: VisionResult): Promise<string>;
}
