import { describe, it, expect } from 'vitest';
import { DEFAULT_HOST, normalizeHost } from './benchmark-config.js';

describe('normalizeHost', () => {
  it('adds the scheme and default port to a bare address', () => {
    expect(normalizeHost('0.0.0.0')).toBe('http://0.0.0.0:11434');
    expect(normalizeHost('localhost')).toBe('http://localhost:11434');
  });

  it('keeps an explicit port', () => {
    expect(normalizeHost('host:1234')).toBe('http://host:1234');
    expect(normalizeHost('gpu-box:11434/')).toBe('http://gpu-box:11434');
  });

  it('leaves URLs with a scheme on their scheme port', () => {
    expect(normalizeHost('https://x')).toBe('https://x');
    expect(normalizeHost('http://example.com/')).toBe('http://example.com');
    expect(normalizeHost('http://127.0.0.1:11434')).toBe('http://127.0.0.1:11434');
  });

  it('keeps a path prefix behind a proxy', () => {
    expect(normalizeHost('https://proxy.example/ollama/')).toBe('https://proxy.example/ollama');
  });

  it('falls back to the default host for blank input', () => {
    expect(normalizeHost('  ')).toBe(DEFAULT_HOST);
  });
});
