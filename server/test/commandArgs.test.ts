import { describe, expect, it } from 'vitest';

import { TypeMismatchError, UnknownParameterError, ParseError } from '../src/errors';
import { coerceArgs } from '../src/mapping/CommandArgs';
import { parseAddress } from '../src/mapping/addressParser';
import { OscArgs } from '../src/osc/OscMessage';

describe('coerceArgs', () => {
  it('accepts integers where floats are expected', () => {
    const args = coerceArgs('position', [OscArgs.int(3)], 'f');
    expect(args.number(0)).toBe(3);
  });

  it('accepts integral floats where integers are expected', () => {
    expect(coerceArgs('length', [OscArgs.float(12)], 'i').number(0)).toBe(12);
    expect(() => coerceArgs('length', [OscArgs.float(12.5)], 'i')).toThrow(TypeMismatchError);
  });

  it('reads booleans from T/F and 0/1', () => {
    expect(coerceArgs('fade_enabled', [OscArgs.bool(true)], 'b').boolean(0)).toBe(true);
    expect(coerceArgs('fade_enabled', [OscArgs.int(0)], 'b').boolean(0)).toBe(false);
    expect(() => coerceArgs('fade_enabled', [OscArgs.int(2)], 'b')).toThrow(TypeMismatchError);
  });

  it('takes optional trailing arguments', () => {
    const args = coerceArgs('add_effect', [OscArgs.string('fx')], 's', 'i');
    expect(args.has(1)).toBe(false);
    expect(coerceArgs('add_effect', [OscArgs.string('fx'), OscArgs.int(30)], 's', 'i').number(1)).toBe(30);
  });

  it('names the expected and received tags', () => {
    expect(() => coerceArgs('bounds', [OscArgs.float(1), OscArgs.string('x')], 'ff')).toThrow(
      '"bounds" expects (ff), got (fs)'
    );
    expect(() => coerceArgs('color', [OscArgs.int(1)], 'iii')).toThrow('"color" expects (iii), got (i)');
    expect(() => coerceArgs('add_effect', [], 's', 'i')).toThrow('"add_effect" expects (s[i]), got ()');
  });

  it('rejects accessors of the wrong kind', () => {
    const args = coerceArgs('mode', [OscArgs.string('wrap')], 's');
    expect(() => args.number(0)).toThrow(TypeMismatchError);
  });
});

describe('parseAddress', () => {
  it('recognizes every target shape', () => {
    expect(parseAddress('/scene/1/effect/2/segment/3/speed')).toEqual({
      kind: 'segment',
      scene: '1',
      effect: '2',
      segment: '3',
      param: 'speed',
    });
    expect(parseAddress('/scene/1/effect/2/set_palette')).toEqual({
      kind: 'effect',
      scene: '1',
      effect: '2',
      param: 'set_palette',
    });
    expect(parseAddress('/scene/1/change_effect')).toEqual({ kind: 'scene', scene: '1', param: 'change_effect' });
    expect(parseAddress('/scene_manager/list_scenes')).toEqual({ kind: 'manager', param: 'list_scenes' });
  });

  it('maps legacy effect addresses onto the active scene', () => {
    const expected = { kind: 'segment', scene: null, effect: '2', segment: '5', param: 'color' };
    expect(parseAddress('/effect/2/segment/5/color')).toEqual(expected);
    expect(parseAddress('/effect/2/object/5/color')).toEqual(expected);
  });

  it('rejects malformed and unknown addresses', () => {
    expect(() => parseAddress('scene/1/x')).toThrow(ParseError);
    expect(() => parseAddress('/scene//x')).toThrow(ParseError);
    expect(() => parseAddress('/scene/1/effect/2')).toThrow(UnknownParameterError);
    expect(() => parseAddress('/lights/on')).toThrow('Unknown address parameter "/lights/on"');
  });
});
