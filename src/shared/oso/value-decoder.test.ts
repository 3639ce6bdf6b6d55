import { describe, expect, it } from 'vitest';
import type { ArraySize, BaseType, TypeDescriptor } from '../types/oso.js';
import { Lexer } from './lexer.js';
import { StringTable } from './string-table.js';
import { OsoParseError } from './errors.js';
import {
  collectValueTokens, decodeDefault, expectedArity, resolvedArrayLength,
} from './value-decoder.js';

function type(base: BaseType, arraySize: ArraySize | null = null, isClosure = false): TypeDescriptor {
  return { base, arraySize, isClosure };
}

function decode(descriptor: TypeDescriptor, src: string) {
  return decodeDefault(descriptor, collectValueTokens(new Lexer(src)), new StringTable());
}

function decodeError(descriptor: TypeDescriptor, src: string): OsoParseError {
  try {
    decode(descriptor, src);
  } catch (err) {
    if (err instanceof OsoParseError) return err;
    throw err;
  }
  throw new Error(`expected ${JSON.stringify(src)} to fail`);
}

describe('collectValueTokens', () => {
  it('stops at the first hint', () => {
    const lexer = new Lexer('1 2 %meta{int,x,1}');
    expect(collectValueTokens(lexer).map(t => t.text)).toEqual(['1', '2']);
    expect(lexer.peek().text).toBe('%');
  });

  it('stops at the end of the line', () => {
    const lexer = new Lexer('"a" "b"\nparam');
    expect(collectValueTokens(lexer).map(t => t.text)).toEqual(['a', 'b']);
    expect(lexer.peek().kind).toBe('eol');
  });
});

describe('decodeDefault', () => {
  it('returns undefined when no values are written', () => {
    expect(decode(type('float', { kind: 'unsized' }), '')).toBeUndefined();
    expect(decode(type('color', null, true), '%read{1,1}')).toBeUndefined();
  });

  it('decodes scalars of each kind', () => {
    expect(decode(type('float'), '0.8')).toEqual({ kind: 'float', values: [0.8] });
    expect(decode(type('int'), '-3')).toEqual({ kind: 'int', values: [-3] });
    expect(decode(type('string'), '"grid.tx"')).toEqual({ kind: 'string', values: ['grid.tx'] });
  });

  it('promotes integers to floats', () => {
    expect(decode(type('float'), '2')).toEqual({ kind: 'float', values: [2] });
  });

  it('accepts true and false for integers', () => {
    expect(decode(type('int', { kind: 'fixed', length: 2 }), 'true false')).toEqual({ kind: 'int', values: [1, 0] });
  });

  it('decodes colours exactly', () => {
    expect(decode(type('color'), '0.1 0.2 0.3')).toEqual({ kind: 'float', values: [0.1, 0.2, 0.3] });
  });

  it('decodes components times array length values for fixed arrays', () => {
    const value = decode(type('color', { kind: 'fixed', length: 2 }), '1 0 0 0 1 0');
    expect(value?.values).toHaveLength(6);
  });

  it('rejects values of the wrong kind', () => {
    const err = decodeError(type('int'), '"notanint"');
    expect(err.kind).toBe('TypeMismatch');
    expect(err.message).toBe('Expected an integer, found "notanint"');
    expect(decodeError(type('int'), '1.5').message).toBe("Expected an integer, found '1.5'");
    expect(decodeError(type('string'), '1').message).toBe("Expected a quoted string, found '1'");
    expect(decodeError(type('float'), 'abc').message).toBe("Expected a number, found 'abc'");
  });

  it('keeps integers to the 32-bit range', () => {
    expect(decode(type('int', { kind: 'fixed', length: 2 }), '2147483647 -2147483648'))
      .toEqual({ kind: 'int', values: [2147483647, -2147483648] });
    const err = decodeError(type('int'), '99999999999999999999');
    expect(err.kind).toBe('TypeMismatch');
    expect(err.message).toBe("Expected a 32-bit integer, found '99999999999999999999'");
    expect(decodeError(type('int'), '2147483648').kind).toBe('TypeMismatch');
    expect(decode(type('float'), '99999999999999999999')).toEqual({ kind: 'float', values: [1e20] });
  });

  it('rejects values for closures, structs and void', () => {
    expect(decodeError(type('color', null, true), '0 0 0').message).toBe('Closure parameters cannot carry a default');
    expect(decodeError(type('struct'), '1').message).toBe("Type 'struct' cannot carry a default");
    expect(decodeError(type('void'), '1').kind).toBe('TypeMismatch');
  });

  it('checks the value count', () => {
    const err = decodeError(type('color'), '1 1');
    expect(err.kind).toBe('ArityMismatch');
    expect(err.message).toBe('Expected 3 values, found 2');
    expect(decodeError(type('color', { kind: 'fixed', length: 2 }), '1 1 1').message)
      .toBe('Expected 6 values, found 3');
    expect(decodeError(type('color', { kind: 'unsized' }), '1 1 1 1').message)
      .toBe('Expected a multiple of 3 values for color[], found 4');
  });

  it('accepts any multiple of the component count for unsized arrays', () => {
    expect(decode(type('float', { kind: 'unsized' }), '1 2 3')).toEqual({ kind: 'float', values: [1, 2, 3] });
    expect(decode(type('point', { kind: 'unsized' }), '0 0 0 1 1 1')?.values).toHaveLength(6);
  });
});

describe('expectedArity', () => {
  it('multiplies components by array length', () => {
    expect(expectedArity(type('float'))).toBe(1);
    expect(expectedArity(type('matrix', { kind: 'fixed', length: 2 }))).toBe(32);
    expect(expectedArity(type('float', { kind: 'unsized' }))).toBeNull();
  });
});

describe('resolvedArrayLength', () => {
  it('resolves element counts', () => {
    expect(resolvedArrayLength(type('float'))).toBeNull();
    expect(resolvedArrayLength(type('float', { kind: 'fixed', length: 4 }))).toBe(4);
    expect(resolvedArrayLength(type('color', { kind: 'unsized' }), { kind: 'float', values: [1, 0, 0, 0, 1, 0] })).toBe(2);
    expect(resolvedArrayLength(type('float', { kind: 'unsized' }))).toBe(0);
  });
});
