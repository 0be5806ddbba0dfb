import { MinimalJsonEncoder, encodeJsonValue, escapeJsonString } from '../MinimalJsonEncoder';
import { PayloadEncodeError } from '../../utils/errors';
import type { TelemetryPayload } from '../../types/telemetry.types';

const payload: TelemetryPayload = {
  status: 'TXI',
  position: {
    lat: 47.4581,
    lon: -8.5555,
    altitude_msl: 1418,
    altitude_agl: 0,
    gs: 12,
    ias: 14,
    vs: -35,
    heading: 270,
    distance: 1,
    sim_time: '2024-05-01T14:03:09Z',
  },
  fuel: 4321,
  flight_time: 3,
};

describe('MinimalJsonEncoder', () => {
  const encoder = new MinimalJsonEncoder();

  it('writes the same bytes as JSON.stringify for a payload', () => {
    const bytes = encoder.encode(payload);
    expect(bytes.toString('utf8')).toBe(JSON.stringify(payload));
    expect(JSON.parse(bytes.toString('utf8'))).toEqual(payload);
  });

  it('is always available', () => {
    expect(encoder.isAvailable()).toBe(true);
    expect(encoder.name).toBe('minimal');
  });
});

describe('escapeJsonString', () => {
  it('escapes quotes, backslashes and control characters', () => {
    const raw = 'a"b\\c\n\t\u0001';
    const escaped = escapeJsonString(raw);
    expect(escaped).toBe('"a\\"b\\\\c\\n\\t\\u0001"');
    expect(JSON.parse(escaped)).toBe(raw);
  });

  it('escapes unpaired surrogates and keeps pairs intact', () => {
    expect(escapeJsonString('x\ud800y')).toBe('"x\\ud800y"');
    expect(escapeJsonString('\udc00')).toBe('"\\udc00"');
    expect(escapeJsonString('😀')).toBe('"😀"');
  });
});

describe('encodeJsonValue', () => {
  it('skips undefined members and writes non-finite numbers as null', () => {
    const value = {
      a: 1,
      b: undefined,
      c: [1, undefined, Number.NaN],
      d: { e: true, f: null, g: Number.NEGATIVE_INFINITY },
      'k"ey': 'v',
    };
    expect(encodeJsonValue(value)).toBe('{"a":1,"c":[1,null,null],"d":{"e":true,"f":null,"g":null},"k\\"ey":"v"}');
  });

  it('allows the same object twice when it is not a cycle', () => {
    const shared = { x: 1 };
    expect(encodeJsonValue({ a: shared, b: [shared] })).toBe('{"a":{"x":1},"b":[{"x":1}]}');
  });

  it('rejects functions with their path', () => {
    expect(() => encodeJsonValue({ nested: { fn: () => 1 } }))
      .toThrow(new PayloadEncodeError('Cannot encode function at $.nested.fn'));
  });

  it('rejects circular references', () => {
    const looped: Record<string, unknown> = { name: 'loop' };
    looped.self = looped;
    expect(() => encodeJsonValue(looped)).toThrow('Circular reference at $.self');
  });

  it('rejects class instances', () => {
    expect(() => encodeJsonValue({ items: [new Date(0)] }))
      .toThrow('Cannot encode Date instance at $.items[0]');
  });
});
