import { InvalidSettingValueError } from './errors';

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Coerce user input (e.g. a CLI argument) into an integer setting value.
 *
 * @throws InvalidSettingValueError for anything but an optionally signed
 * run of digits within the safe integer range
 */
export function parseSettingValue(raw: string): number {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new InvalidSettingValueError(raw);
  }

  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) {
    throw new InvalidSettingValueError(raw);
  }

  // Number('-0') is -0, which JSON writes as 0
  return value === 0 ? 0 : value;
}
