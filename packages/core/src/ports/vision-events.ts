import type { VisionResult } from '../domain/vision/vision-result.js';

export interface VisionEvents {
  onImageSkipped(imagePath: string, reason: string): void;
  onModelSkipped(model: string, reason: string): void;
  onModelStart(model: string, image: string): void;
  onResultSaved(result: VisionResult, filePath: string): void;
  onResultFailed(result: VisionResult, filePath: string): void;
}
