import type { ImageType } from './image-file.js';

export interface VisionMetadata {
  totalDuration?: number;
  loadDuration?: number;
  evalDuration?: number;
  evalCount?: number;
}

export interface VisionResult {
  timestamp: string;
  model: string;
  image: string;
  imageType: ImageType;
  response?: string;
  error?: string;
  metadata?: VisionMetadata;
}
