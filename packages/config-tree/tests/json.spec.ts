import { describe, expect, it, vi } from 'vitest';

import { ConfigValueError, fromJson, mapFromJson, mapToJson, toJson } from '../src/json';
import { float, int, list, map, raw, str } from '../src/values';

describe('fromJson', () => {
  it('should tell integers from floats', () => {
    expect(fromJson(20)).toEqual(int(20));
    expect(fromJson(0.5)).toEqual(float(0.5));
  });

  it('should keep object key order', () => {
    const config = mapFromJson({ zeta: 'z', alpha: 'a', tags: { b: 1, a: 2 } });

    expect([...config.keys()]).toEqual(['zeta', 'alpha', 'tags']);
    expect(config.get('tags')).toEqual(map([['b', int(1)], ['a', int(2)]]));
  });

  it('should convert lists of objects', () => {
    expect(fromJson([{ port: 80 }, { port: 443 }])).toEqual(list(map({ port: int(80) }), map({ port: int(443) })));
  });

  it('should reject lists mixing objects and scalars', () => {
    expect(() => fromJson({ rules: [{ port: 80 }, 'ssh'] })).toThrow(ConfigValueError);
    expect(() => fromJson({ rules: [{ port: 80 }, 'ssh'] })).toThrow('List mixes objects with other values at "rules"');
  });

  it('should reject non-finite numbers', () => {
    expect(() => fromJson({ size: Number.POSITIVE_INFINITY })).toThrow('Non-finite number Infinity at "size"');
  });

  it('should reject values JSON cannot hold', () => {
    expect(() => fromJson({ handler: () => 1 })).toThrow('Unsupported value of type function at "handler"');
  });

  it('should keep null as a raw expression and report it', () => {
    const onAmbiguity = vi.fn();

    expect(fromJson({ items: [null] }, onAmbiguity)).toEqual(map({ items: list(raw('null')) }));
    expect(onAmbiguity).toHaveBeenCalledWith('items[0]', null);
  });

  it('should require an object for mapFromJson', () => {
    expect(() => mapFromJson(['a'])).toThrow('Expected an object');
  });
});

describe('toJson', () => {
  it('should invert fromJson', () => {
    const input = { bucket: 'b', versioning: { enabled: true }, ports: [80, 443], ratio: 0.5, rules: [{ a: 'x' }], kms: null };
    expect(mapToJson(mapFromJson(input))).toEqual(input);
  });

  it('should return raw expressions other than null as text', () => {
    expect(toJson(raw('var.x'))).toBe('var.x');
    expect(toJson(str('s'))).toBe('s');
  });
});

describe('tagged floats', () => {
  const options = { tagFloats: true };

  it('should write whole-number floats in tagged form', () => {
    expect(mapToJson(map({ ratio: float(2), share: float(0.5), count: int(2) }).value, options)).toEqual({
      ratio: { $float: 2 },
      share: 0.5,
      count: 2,
    });
  });

  it('should read the tagged form back as a float', () => {
    const config = mapFromJson({ ratio: { $float: 2 }, items: [{ $float: 1 }], count: 2 }, undefined, options);

    expect(config.get('ratio')).toEqual(float(2));
    expect(config.get('items')).toEqual(list(float(1)));
    expect(config.get('count')).toEqual(int(2));
  });

  it('should keep the float kind across a round trip', () => {
    const config = map({ ratio: float(3), tags: map({ weight: float(1) }) }).value;

    expect(mapFromJson(mapToJson(config, options), undefined, options)).toEqual(config);
  });

  it('should treat the tag as a plain map unless enabled', () => {
    expect(fromJson({ $float: 2 })).toEqual(map({ $float: int(2) }));
    expect(toJson(float(2))).toBe(2);
  });

  it('should leave objects with other keys as maps', () => {
    expect(fromJson({ $float: 2, unit: 'x' }, undefined, options)).toEqual(map({ $float: int(2), unit: str('x') }));
  });
});
