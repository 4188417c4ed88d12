import { canonicalJsonStringify, canonicalize } from '../src/utils/canonicalize';
import { SerializationError } from '../src/utils/errors';

describe('canonical JSON', () => {
  test('sorts keys at every depth', () => {
    expect(canonicalJsonStringify({ b: 1, a: { d: [{ z: 1, y: 2 }], c: 'x' } })).toBe(
      '{"a":{"c":"x","d":[{"y":2,"z":1}]},"b":1}'
    );
  });

  test('same payload with different key order serializes identically', () => {
    expect(canonicalJsonStringify({ x: 1, y: 2 })).toBe(canonicalJsonStringify({ y: 2, x: 1 }));
  });

  test('drops undefined members and keeps null', () => {
    expect(canonicalJsonStringify({ a: undefined, b: null })).toBe('{"b":null}');
  });

  test('preserves array order', () => {
    expect(canonicalize(['b', 'a'])).toEqual(['b', 'a']);
  });

  test('renders dates as ISO strings', () => {
    expect(canonicalJsonStringify({ at: new Date(Date.UTC(2024, 4, 1)) })).toBe('{"at":"2024-05-01T00:00:00.000Z"}');
  });

  test('rejects non-finite numbers with the field path', () => {
    expect(() => canonicalize({ readings: [1, Number.NaN] })).toThrow(SerializationError);
    expect(() => canonicalize({ readings: [1, Number.NaN] })).toThrow(
      'Non-finite number at readings[1] cannot be canonicalized'
    );
  });

  test('rejects values that are not plain data', () => {
    expect(() => canonicalize({ handler: () => undefined })).toThrow('Unsupported value type at handler: function');
    expect(() => canonicalize({ tags: new Set(['a']) })).toThrow('Unsupported value type at tags: object');
  });
});
