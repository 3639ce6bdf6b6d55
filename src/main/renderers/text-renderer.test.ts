import { describe, expect, it } from 'vitest';
import type { Parameter, ParameterValue, TypeDescriptor } from '../../shared/types/oso.js';
import { ShaderQuery } from '../../shared/shader-query.js';
import { escapeString, formatDefault, formatMetadata, renderText } from './text-renderer.js';

const MATTE = [
  'OpenShadingLanguage 1.12',
  'shader surface "matte"',
  'param float Kd 0.8',
  'param color Cs 1 1 1 %string label "diffuse color"',
  'code ___main___',
].join('\n');

function param(type: TypeDescriptor, value?: ParameterValue): Parameter {
  const p: Parameter = {
    name: 'p', type, direction: 'input', arrayLength: null, metadata: [], structFields: [],
  };
  if (value) p.default = value;
  return p;
}

describe('renderText', () => {
  it('renders an aligned table', () => {
    expect(renderText(ShaderQuery.fromString(MATTE))).toBe(
      'surface "matte"\n' +
      'Kd float  0.8\n' +
      'Cs color  [1 1 1]\n',
    );
  });

  it('marks outputs and missing defaults', () => {
    const query = ShaderQuery.fromString('shader surface "s"\nparam float Kd 0.5\noparam color Cout');
    expect(renderText(query)).toBe(
      'surface "s"\n' +
      'Kd   float' + ' '.repeat(9) + '0.5\n' +
      'Cout output color  <no default>\n',
    );
  });

  it('renders a verbose listing with metadata', () => {
    expect(renderText(ShaderQuery.fromString(MATTE), { verbose: true })).toBe(
      'surface "matte"\n' +
      '    "Kd" "float"\n' +
      '\t\tDefault value: 0.8\n' +
      '    "Cs" "color"\n' +
      '\t\tDefault value: [1 1 1]\n' +
      '\t\tmetadata: string label = "diffuse color"\n',
    );
  });

  it('shows the space and struct fields in the verbose listing', () => {
    const query = ShaderQuery.fromString(
      'shader s\nparam point P 0 0 0 %space{"world"}\nparam struct Light l %structfields{pos,power}');
    expect(renderText(query, { verbose: true })).toBe(
      'shader "s"\n' +
      '    "P" "point"\n' +
      '\t\tDefault value: [0 0 0]\n' +
      '\t\tspace: world\n' +
      '    "l" "struct Light"\n' +
      '\t\tDefault value: <no default>\n' +
      '\t\tfields: pos, power\n',
    );
  });

  it('renders shader metadata under the header', () => {
    const query = ShaderQuery.fromString('surface s %meta{string,help,"Help text"}');
    expect(renderText(query)).toBe('surface "s"\n\tmetadata: string help = "Help text"\n');
  });

  it('narrows output to one parameter', () => {
    expect(renderText(ShaderQuery.fromString(MATTE), { param: 'Cs' })).toBe(
      'surface "matte"\n' +
      'Cs color  [1 1 1]\n',
    );
  });
});

describe('formatDefault', () => {
  it('formats scalars, aggregates and arrays', () => {
    expect(formatDefault(param({ base: 'int', arraySize: null, isClosure: false }, { kind: 'int', values: [3] })))
      .toBe('3');
    expect(formatDefault(param({ base: 'string', arraySize: { kind: 'unsized' }, isClosure: false },
      { kind: 'string', values: ['a', 'b'] })))
      .toBe('["a" "b"]');
    expect(formatDefault(param({ base: 'color', arraySize: { kind: 'fixed', length: 2 }, isClosure: false },
      { kind: 'float', values: [1, 0, 0, 0, 1, 0] })))
      .toBe('[[1 0 0] [0 1 0]]');
    expect(formatDefault(param({ base: 'float', arraySize: { kind: 'fixed', length: 2 }, isClosure: false },
      { kind: 'float', values: [0.25, 0.5] })))
      .toBe('[0.25 0.5]');
  });

  it('escapes strings', () => {
    expect(formatDefault(param({ base: 'string', arraySize: null, isClosure: false },
      { kind: 'string', values: ['say "hi"\n'] })))
      .toBe('"say \\"hi\\"\\n"');
  });

  it('marks a missing default', () => {
    expect(formatDefault(param({ base: 'float', arraySize: { kind: 'unsized' }, isClosure: false })))
      .toBe('<no default>');
  });
});

describe('formatMetadata', () => {
  it('marks multi-value entries as arrays', () => {
    expect(formatMetadata({
      key: 'range',
      type: { base: 'float', arraySize: null, isClosure: false },
      value: { kind: 'float', values: [0, 1] },
    })).toBe('metadata: float[] range = 0 1');
  });
});

describe('escapeString', () => {
  it('escapes quotes, backslashes and control characters', () => {
    expect(escapeString('a\\b"c\td\r')).toBe('a\\\\b\\"c\\td\\r');
  });
});
