import type {
  ChatRequest,
  ChatResult,
  GenerationChunk,
  GenerationRequest,
  ServerTimings,
} from '../domain/inference/generation.js';
import type { InstalledModel } from '../domain/inference/installed-model.js';
import type { GenerationOutcome, InferenceGateway } from '../ports/inference-gateway.js';
import { InferenceError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { parseOllamaChat, parseOllamaStreamLine, parseOllamaTags } from './parsers/ollama-parser.js';

const log = createLogger('ollama-gateway');

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface OllamaGatewayOptions {
  /** 0 or undefined leaves requests to the HTTP client's own defaults. */
  timeoutMs?: number;
  fetch?: FetchLike;
}

function describeCause(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause = err.cause;
  if (cause instanceof Error && cause.message && cause.message !== err.message) {
    return `${err.message} (${cause.message})`;
  }
  return err.message;
}

function extractErrorDetail(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (parsed && typeof parsed === 'object' && 'error' in parsed && typeof parsed.error === 'string') {
      return parsed.error;
    }
  } catch {
    // not JSON, fall through to the raw body
  }
  return body.trim().slice(0, 500) || 'no response body';
}

/** Client for the Ollama HTTP API (`/api/tags`, `/api/generate`, `/api/chat`). */
export class OllamaGateway implements InferenceGateway {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(
    public readonly host: string,
    options: OllamaGatewayOptions = {},
  ) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  async listModels(): Promise<InstalledModel[]> {
    const response = await this.request('/api/tags', { method: 'GET' });
    const models = parseOllamaTags(await this.readJson(response, '/api/tags'));
    log.debug(`listModels: ${models.length} models installed`);
    return models;
  }

  async generateStream(
    request: GenerationRequest,
    onChunk: (chunk: GenerationChunk) => void,
  ): Promise<GenerationOutcome> {
    log.debug(`generateStream: starting request to ${request.model}`);
    const response = await this.request(
      '/api/generate',
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: request.model, prompt: request.prompt, stream: true }),
      },
      request.model,
    );

    if (!response.body) {
      throw new InferenceError(`Inference server sent an empty response for ${request.model}`, this.host, response.status);
    }

    const seen: { text: string; timings: ServerTimings | null; done: boolean } = {
      text: '',
      timings: null,
      done: false,
    };

    const handleLine = (line: string) => {
      const chunk = parseOllamaStreamLine(line);
      if (!chunk) return;
      if (chunk.error) {
        throw new InferenceError(`Inference server error for ${request.model}: ${chunk.error}`, this.host);
      }
      seen.text += chunk.text;
      if (chunk.done) {
        seen.done = true;
        seen.timings = chunk.timings ?? null;
      }
      onChunk(chunk);
    };

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        buffer += decoder.decode(value, { stream: true });
        const lines = buffer.split('\n');
        buffer = lines.pop() ?? '';
        for (const line of lines) handleLine(line);
      }
      buffer += decoder.decode();
      handleLine(buffer);
    } catch (err) {
      await reader.cancel().catch((cancelErr: unknown) => {
        log.debug(`generateStream: cancelling the ${request.model} stream failed:`, describeCause(cancelErr));
      });
      if (err instanceof InferenceError) throw err;
      throw new InferenceError(
        `Stream from ${this.host} for ${request.model} failed: ${describeCause(err)}`,
        this.host,
      );
    } finally {
      reader.releaseLock();
    }

    if (!seen.done) {
      throw new InferenceError(`Stream from ${this.host} for ${request.model} ended before completion`, this.host);
    }

    log.debug(`generateStream: ${request.model} finished, ${seen.text.length} chars`);
    return { text: seen.text, timings: seen.timings };
  }

  async chat(request: ChatRequest): Promise<ChatResult> {
    const response = await this.request(
      '/api/chat',
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: request.model,
          messages: [{ role: 'user', content: request.prompt, images: request.images ?? [] }],
          stream: false,
        }),
      },
      request.model,
    );
    return parseOllamaChat(await this.readJson(response, '/api/chat'));
  }

  private async request(path: string, init: RequestInit, model?: string): Promise<Response> {
    const url = `${this.host}${path}`;
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        ...init,
        signal: this.timeoutMs > 0 ? AbortSignal.timeout(this.timeoutMs) : undefined,
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new InferenceError(`Request to ${url} timed out after ${this.timeoutMs}ms`, this.host);
      }
      throw new InferenceError(`Cannot reach inference server at ${this.host}: ${describeCause(err)}`, this.host);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      const target = model ? ` for ${model}` : '';
      log.error(`request: HTTP ${response.status} from ${url}`);
      throw new InferenceError(
        `Inference server returned HTTP ${response.status}${target}: ${extractErrorDetail(body)}`,
        this.host,
        response.status,
      );
    }

    return response;
  }

  private async readJson(response: Response, path: string): Promise<unknown> {
    try {
      return await response.json();
    } catch (err) {
      throw new InferenceError(`Malformed response from ${this.host}${path}: ${describeCause(err)}`, this.host, response.status);
    }
  }
}
