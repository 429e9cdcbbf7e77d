import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseCount } from '../../../src/cli/shared.js';

describe('parseCount', () => {
  it.each([
    ['0', 0],
    ['15', 15],
    [' 7 ', 7],
  ])('parses %j', (raw, expected) => {
    expect(parseCount(raw)).toBe(expected);
  });

  it.each(['', '-1', '2.5', 'ten'])('rejects %j', (raw) => {
    expect(() => parseCount(raw)).toThrow(InvalidArgumentError);
  });
});
