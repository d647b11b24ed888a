import { Command, InvalidArgumentError } from 'commander';
import {
  addCommonOptions,
  parseFiniteNumber,
  parseLogLevel,
  parseNonNegativeInteger,
  parsePositiveInteger,
  parsePositiveNumber,
  parseResultsFormat,
  parseThreadCounts,
} from './cli';
import { CommonCliOptions } from './config/settings';
import { MATRIX_DEFAULTS } from './config/defaults';

describe('cli', () => {
  describe('thread count parsing', () => {
    it('should split comma-separated counts', () => {
      expect(parseThreadCounts('1,2,4,8')).toEqual([1, 2, 4, 8]);
    });

    it('should ignore whitespace and empty entries', () => {
      expect(parseThreadCounts(' 1, 2,, 16 ')).toEqual([1, 2, 16]);
    });

    it('should keep the given order', () => {
      expect(parseThreadCounts('8,1,4')).toEqual([8, 1, 4]);
    });

    it('should reject an empty list', () => {
      expect(() => parseThreadCounts(' , ')).toThrow('Expected at least one thread count.');
    });

    it.each(['0', '-2', '1.5', 'four'])('should reject %j', value => {
      expect(() => parseThreadCounts(`1,${value}`)).toThrow(`"${value}" is not a positive integer.`);
    });

    it('should reject repeated counts', () => {
      expect(() => parseThreadCounts('1,2,2')).toThrow(InvalidArgumentError);
    });
  });

  describe('number parsing', () => {
    it('should parse positive integers', () => {
      expect(parsePositiveInteger('3')).toBe(3);
      expect(() => parsePositiveInteger('0')).toThrow('"0" is not a positive integer.');
      expect(() => parsePositiveInteger('2.5')).toThrow(InvalidArgumentError);
    });

    it('should parse non-negative integers', () => {
      expect(parseNonNegativeInteger('0')).toBe(0);
      expect(() => parseNonNegativeInteger('-1')).toThrow('"-1" is not a non-negative integer.');
    });

    it('should parse finite numbers including exponents and negatives', () => {
      expect(parseFiniteNumber('-1.5')).toBe(-1.5);
      expect(parseFiniteNumber('1e-4')).toBe(0.0001);
      expect(() => parseFiniteNumber('')).toThrow('"" is not a number.');
      expect(() => parseFiniteNumber('Infinity')).toThrow(InvalidArgumentError);
    });

    it('should require positive numbers where asked', () => {
      expect(parsePositiveNumber('0.5')).toBe(0.5);
      expect(() => parsePositiveNumber('0')).toThrow('"0" must be greater than zero.');
    });
  });

  describe('format and log level parsing', () => {
    it('should accept known values', () => {
      expect(parseResultsFormat('markdown')).toBe('markdown');
      expect(parseLogLevel('trace')).toBe('trace');
    });

    it('should reject unknown values', () => {
      expect(() => parseResultsFormat('html')).toThrow('Expected one of: pretty, markdown, json.');
      expect(() => parseLogLevel('verbose')).toThrow('Expected one of: trace, debug, info, warn, error.');
    });
  });

  describe('common options', () => {
    const parse = (args: string[]): CommonCliOptions => {
      const command = addCommonOptions(new Command('matmul'), MATRIX_DEFAULTS).exitOverride();
      command.parse(args, { from: 'user' });
      return command.opts<CommonCliOptions>();
    };

    it('should leave unset options undefined so defaults can apply later', () => {
      const opts = parse([]);

      expect(opts.threads).toBeUndefined();
      expect(opts.runs).toBeUndefined();
      expect(opts.output).toBeUndefined();
    });

    it('should convert option values with the parsers', () => {
      const opts = parse(['-t', '1,2,4', '-r', '5', '--timeout', '2.5', '-f', 'json', '-o', 'out.csv']);

      expect(opts).toEqual(
        expect.objectContaining({ threads: [1, 2, 4], runs: 5, timeout: 2.5, format: 'json', output: 'out.csv' })
      );
    });

    it('should set output to false for --no-output', () => {
      expect(parse(['--no-output']).output).toBe(false);
    });

    it('should reject invalid values', () => {
      expect(() => parse(['--threads', '1,0'])).toThrow();
    });
  });
});
