export interface BenchmarkConfig {
  host: string;
  prompt: string;
  runs: number;
  /** 0 disables the per-request timeout. */
  timeoutMs: number;
}

export const DEFAULT_HOST = 'http://127.0.0.1:11434';
export const DEFAULT_PROMPT = 'Why is the sky blue?';
export const DEFAULT_RUNS = 1;
export const DEFAULT_TIMEOUT_MS = 0;

export const DEFAULT_PORT = 11434;

const SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;
const EXPLICIT_PORT = /:\d+$/;

/**
 * Turns `OLLAMA_HOST`-style values into a base URL. Input without a scheme
 * gets `http://` and, unless it names a port, the default server port.
 * Trailing slashes are dropped.
 */
export function normalizeHost(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  if (!trimmed) return DEFAULT_HOST;

  const hasScheme = SCHEME.test(trimmed);
  let url: URL;
  try {
    url = new URL(hasScheme ? trimmed : `http://${trimmed}`);
  } catch {
    return hasScheme ? trimmed : `http://${trimmed}`;
  }

  const authority = hasScheme ? '' : trimmed.split('/')[0];
  if (!hasScheme && !EXPLICIT_PORT.test(authority)) url.port = String(DEFAULT_PORT);

  return `${url.origin}${url.pathname.replace(/\/+$/, '')}`;
}
