import { describe, expect, it } from 'vitest';
import { StringTable } from './string-table.js';

describe('StringTable', () => {
  it('stores each distinct string once', () => {
    const strings = new StringTable();
    strings.intern('Kd');
    strings.intern('Cs');
    expect(strings.intern('Kd')).toBe('Kd');
    expect(strings.size).toBe(2);
    expect(strings.has('Cs')).toBe(true);
    expect(strings.has('N')).toBe(false);
  });
});
