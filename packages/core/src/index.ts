// Domain types
export type { BenchmarkConfig } from './domain/benchmark/benchmark-config.js';
export { DEFAULT_HOST, DEFAULT_PROMPT, DEFAULT_RUNS, DEFAULT_TIMEOUT_MS, normalizeHost } from './domain/benchmark/benchmark-config.js';
export type { BenchmarkSample, SampleMetrics } from './domain/benchmark/sample.js';
export { computeSampleMetrics } from './domain/benchmark/sample.js';
export type { Stat, ModelStatus, ModelSummary } from './domain/benchmark/statistics.js';
export { summarizeValues, summarizeSamples, skippedSummary, runningMeanTokensPerSecond } from './domain/benchmark/statistics.js';
export type { BenchmarkReport } from './domain/benchmark/benchmark-report.js';
export { measureGeneration } from './domain/benchmark/measure.js';
export type { MeasureRequest } from './domain/benchmark/measure.js';

export type { ServerTimings, GenerationRequest, GenerationChunk, ChatRequest, ChatResult } from './domain/inference/generation.js';
export type { InstalledModel } from './domain/inference/installed-model.js';
export { findInstalledModel } from './domain/inference/installed-model.js';

export type { ImageType, ImageCheck } from './domain/vision/image-file.js';
export { detectImageType, expandImageInputs, imageStem, sidecarPromptPath } from './domain/vision/image-file.js';
export type { VisionResult, VisionMetadata } from './domain/vision/vision-result.js';
export { DEFAULT_IMAGE_PROMPT } from './domain/vision/prompts.js';

// Port interfaces
export type { InferenceGateway, GenerationOutcome } from './ports/inference-gateway.js';
export type { Clock } from './ports/clock.js';
export type { BenchmarkEvents } from './ports/benchmark-events.js';
export type { VisionEvents } from './ports/vision-events.js';
export type { ConfigStore, BenchmarkPrefs } from './ports/config-store.js';
export type { VisionResultRepository } from './ports/vision-result-repository.js';

// Adapters
export { OllamaGateway } from './adapters/ollama-gateway.js';
export type { OllamaGatewayOptions, FetchLike } from './adapters/ollama-gateway.js';
export { JsonConfigStore } from './adapters/json-config-store.js';
export { JsonVisionResultRepository, modelFileName } from './adapters/json-vision-result-repository.js';
export { systemClock } from './adapters/system-clock.js';
export { parseOllamaStreamLine, parseOllamaTags, parseOllamaChat } from './adapters/parsers/ollama-parser.js';

// Application services
export { BenchmarkService, MODEL_NOT_INSTALLED } from './services/benchmark-service.js';
export type { BenchmarkInput, BenchmarkDeps } from './services/benchmark-service.js';
export { VisionService } from './services/vision-service.js';
export type { VisionInput, VisionDeps } from './services/vision-service.js';
export { ConfigService } from './services/config-service.js';
export type { ConfigOverrides } from './services/config-service.js';
export { ModelInventoryService } from './services/model-inventory-service.js';

// Shared
export { createLogger, setLogLevel, getLogLevel, isLogLevel } from './shared/logger.js';
export type { Logger, LogLevel } from './shared/logger.js';
export { SpeedbenchError, ConfigError, InferenceError, errorMessage } from './shared/errors.js';
