import { describe, expect, it } from 'vitest';

import { isPlainObject, isPrimitive, isThenable } from '../src/is';
import { dropUndefinedKeys } from '../src/object';
import { truncate } from '../src/string';

describe('dropUndefinedKeys', () => {
  it('removes undefined fields at every depth', () => {
    expect(
      dropUndefinedKeys({
        a: 1,
        b: undefined,
        nested: { c: undefined, d: 'x' },
        list: [{ e: undefined, f: null }],
      }),
    ).toEqual({ a: 1, nested: { d: 'x' }, list: [{ f: null }] });
  });

  it('keeps class instances untouched', () => {
    class Holder {
      public value: string | undefined = undefined;
    }
    const holder = new Holder();

    const result = dropUndefinedKeys({ holder });
    expect(result.holder).toBe(holder);
  });

  it('preserves circular references', () => {
    const input: { name: string; self?: unknown; missing?: string } = {
      name: 'loop',
      missing: undefined,
    };
    input.self = input;

    const result = dropUndefinedKeys(input);
    expect(result.self).toBe(result);
    expect('missing' in result).toBe(false);
  });
});

describe('truncate', () => {
  it('leaves short strings alone', () => {
    expect(truncate('short', 10)).toBe('short');
    expect(truncate('exactly10!', 10)).toBe('exactly10!');
  });

  it('cuts long strings and marks the cut', () => {
    expect(truncate('abcdefghij', 4)).toBe('abcd...');
  });

  it('treats zero as no limit', () => {
    expect(truncate('abcdefghij', 0)).toBe('abcdefghij');
  });
});

describe('type guards', () => {
  it('recognizes thenables', () => {
    expect(isThenable(Promise.resolve())).toBe(true);
    expect(isThenable({ then: () => undefined })).toBe(true);
    expect(isThenable({ then: 1 })).toBe(false);
    expect(isThenable(null)).toBe(false);
  });

  it('recognizes plain objects and primitives', () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPrimitive('text')).toBe(true);
    expect(isPrimitive(null)).toBe(true);
    expect(isPrimitive({})).toBe(false);
  });
});
