import { InvalidArgumentError } from 'commander';
import { FORMAT_NAMES, isFormatName, type FormatName } from '../formatters/index.js';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function parseFormat(value: string): FormatName {
  if (!isFormatName(value)) {
    throw new InvalidArgumentError(`Expected one of: ${FORMAT_NAMES.join(', ')}.`);
  }
  return value;
}
