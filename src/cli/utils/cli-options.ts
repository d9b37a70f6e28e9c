import { InvalidArgumentError } from 'commander';

/**
 * 整数オプションのパーサー
 */
export const parseIntegerOption = (value: string): number => {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
};

/**
 * 1以上の整数オプションのパーサー
 */
export const parsePositiveIntegerOption = (value: string): number => {
  const parsed = parseIntegerOption(value);
  if (parsed < 1) {
    throw new InvalidArgumentError('Must be >= 1.');
  }
  return parsed;
};

/**
 * 有限数オプションのパーサー
 */
export const parseNumberOption = (value: string): number => {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
};
