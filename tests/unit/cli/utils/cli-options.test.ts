import { describe, it } from 'node:test';
import assert from 'node:assert';
import { InvalidArgumentError } from 'commander';
import {
  parseIntegerOption,
  parsePositiveIntegerOption,
  parseNumberOption,
} from '../../../../src/cli/utils/cli-options.ts';

describe('cli option parsers', () => {
  it('should parse integers', () => {
    assert.strictEqual(parseIntegerOption('8'), 8);
    assert.strictEqual(parseIntegerOption('-3'), -3);
    assert.throws(() => parseIntegerOption('2.5'), InvalidArgumentError);
    assert.throws(() => parseIntegerOption('abc'), InvalidArgumentError);
    assert.throws(() => parseIntegerOption(''), InvalidArgumentError);
  });

  it('should require positive integers where asked', () => {
    assert.strictEqual(parsePositiveIntegerOption('1'), 1);
    assert.throws(() => parsePositiveIntegerOption('0'), InvalidArgumentError);
  });

  it('should parse finite numbers', () => {
    assert.strictEqual(parseNumberOption('0.25'), 0.25);
    assert.throws(() => parseNumberOption('Infinity'), InvalidArgumentError);
    assert.throws(() => parseNumberOption(' '), InvalidArgumentError);
  });
});
