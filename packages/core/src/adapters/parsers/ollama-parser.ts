import type { ChatResult, GenerationChunk, ServerTimings } from '../../domain/inference/generation.js';
import type { InstalledModel } from '../../domain/inference/installed-model.js';

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function asOptionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function asRecord(value: unknown): Record<string, unknown> {
  return value && typeof value === 'object' && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : {};
}

export function extractServerTimings(payload: Record<string, unknown>): ServerTimings {
  const timings: ServerTimings = {};
  const fields: Array<[keyof ServerTimings, string]> = [
    ['totalDurationNs', 'total_duration'],
    ['loadDurationNs', 'load_duration'],
    ['promptEvalCount', 'prompt_eval_count'],
    ['promptEvalDurationNs', 'prompt_eval_duration'],
    ['evalCount', 'eval_count'],
    ['evalDurationNs', 'eval_duration'],
  ];
  for (const [key, wireName] of fields) {
    const value = asOptionalNumber(payload[wireName]);
    if (value !== undefined) timings[key] = value;
  }
  return timings;
}

/**
 * Parses one NDJSON line of a streaming `/api/generate` or `/api/chat`
 * response. Blank or non-JSON lines yield null.
 */
export function parseOllamaStreamLine(line: string): GenerationChunk | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  let payload: unknown;
  try {
    payload = JSON.parse(trimmed);
  } catch {
    return null;
  }

  const obj = asRecord(payload);
  const error = asString(obj.error);
  if (error) {
    return { text: '', done: true, error, rawLine: line };
  }

  const text = asString(obj.response) || asString(asRecord(obj.message).content);
  const done = obj.done === true;
  return {
    text,
    done,
    timings: done ? extractServerTimings(obj) : null,
    rawLine: line,
  };
}

export function parseOllamaTags(payload: unknown): InstalledModel[] {
  const models = asRecord(payload).models;
  if (!Array.isArray(models)) return [];

  const result: InstalledModel[] = [];
  for (const entry of models) {
    const m = asRecord(entry);
    const name = asString(m.name) || asString(m.model);
    if (!name) continue;
    const details = asRecord(m.details);
    result.push({
      name,
      sizeBytes: asOptionalNumber(m.size) ?? 0,
      family: asString(details.family) || undefined,
      parameterSize: asString(details.parameter_size) || undefined,
      quantization: asString(details.quantization_level) || undefined,
      modifiedAt: asString(m.modified_at) || undefined,
    });
  }
  return result.sort((a, b) => a.name.localeCompare(b.name));
}

export function parseOllamaChat(payload: unknown): ChatResult {
  const obj = asRecord(payload);
  return {
    content: asString(asRecord(obj.message).content),
    timings: extractServerTimings(obj),
  };
}
