import { describe, it, expect } from 'vitest';
import {
  parseFuzzyFields,
  parseParamValue,
  parsePositiveInt,
  parseQueryParams,
  parseThreshold,
} from '../../../src/cli/params.js';
import { InvalidArgumentError } from '../../../src/cli/errors.js';

describe('parseParamValue', () => {
  it('types numbers, booleans and null', () => {
    expect(parseParamValue('42')).toBe(42);
    expect(parseParamValue('-1.5')).toBe(-1.5);
    expect(parseParamValue('true')).toBe(true);
    expect(parseParamValue('false')).toBe(false);
    expect(parseParamValue('null')).toBeNull();
  });

  it('keeps integers beyond the safe range exact', () => {
    expect(parseParamValue('9007199254740993')).toBe(9007199254740993n);
  });

  it('leaves other text as strings and unwraps quotes', () => {
    expect(parseParamValue('draft')).toBe('draft');
    expect(parseParamValue('"42"')).toBe('42');
    expect(parseParamValue('1e3')).toBe('1e3');
  });
});

describe('parseQueryParams', () => {
  it('returns undefined when nothing is given', () => {
    expect(parseQueryParams()).toBeUndefined();
    expect(parseQueryParams([], [])).toBeUndefined();
  });

  it('builds named parameters, splitting on the first equals sign', () => {
    expect(parseQueryParams(['status=draft', 'expr=a=b', 'n=3'])).toEqual({
      status: 'draft',
      expr: 'a=b',
      n: 3,
    });
  });

  it('builds positional parameters in order', () => {
    expect(parseQueryParams([], ['1', 'x', 'null'])).toEqual([1, 'x', null]);
  });

  it('rejects malformed pairs', () => {
    expect(() => parseQueryParams(['status'])).toThrow('Expected name=value, got "status"');
    expect(() => parseQueryParams(['=draft'])).toThrow(InvalidArgumentError);
  });

  it('rejects mixing both kinds', () => {
    expect(() => parseQueryParams(['a=1'], ['2'])).toThrow('Use either --param or --arg, not both');
  });
});

describe('numeric options', () => {
  it('parses positive integers', () => {
    expect(parsePositiveInt('10', '--limit')).toBe(10);
    expect(parsePositiveInt(undefined, '--limit')).toBeUndefined();
    expect(() => parsePositiveInt('0', '--limit')).toThrow('--limit must be a positive integer, got "0"');
    expect(() => parsePositiveInt('2.5', '--timeout')).toThrow(InvalidArgumentError);
  });

  it('parses thresholds between 0 and 1', () => {
    expect(parseThreshold('0.5')).toBe(0.5);
    expect(parseThreshold('0')).toBe(0);
    expect(() => parseThreshold('1.2')).toThrow('--threshold must be between 0 and 1, got "1.2"');
  });
});

describe('parseFuzzyFields', () => {
  it('accepts a comma list without duplicates', () => {
    expect(parseFuzzyFields('title, content,title')).toEqual(['title', 'content']);
    expect(parseFuzzyFields(undefined)).toBeUndefined();
  });

  it('rejects unknown fields', () => {
    expect(() => parseFuzzyFields('title,body')).toThrow(
      'Unknown field "body"; expected one of title, headings, content'
    );
  });
});
