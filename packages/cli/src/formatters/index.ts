import type { OutputSink } from '../adapters/output-sink.js';
import type { OutputFormatter } from './formatter.js';
import { JsonFormatter } from './json.js';
import { MarkdownFormatter } from './markdown.js';
import { PlainFormatter } from './plain.js';

export type FormatName = 'interactive' | 'plain' | 'md' | 'json';

export const FORMAT_NAMES: readonly FormatName[] = ['interactive', 'plain', 'md', 'json'];

export function isFormatName(value: string): value is FormatName {
  return FORMAT_NAMES.some((name) => name === value);
}

/** Non-interactive formatter for a format name; `interactive` falls back to plain. */
export function createFormatter(format: FormatName, sink?: OutputSink): OutputFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter(sink);
    case 'md':
      return new MarkdownFormatter(sink);
    default:
      return new PlainFormatter(sink);
  }
}

export type { OutputFormatter } from './formatter.js';
