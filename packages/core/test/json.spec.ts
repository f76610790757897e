/* packages/core/test/json.spec.ts */
import { describe, it, expect } from 'vitest';
import { decodeJson, entriesOf, isJsonObject } from '../src';
import type { JsonObject } from '../src';

function decodeObject(text: string): JsonObject {
  const value = decodeJson(text);
  if (!isJsonObject(value)) throw new Error(`not an object: ${text}`);
  return value;
}

describe('decodeJson', () => {
  it('decodes like JSON.parse', () => {
    const text = '{"label":1,"general":{"size":3,"flags":[true,null,"x"]},"avg":-2.5e3}';
    expect(decodeJson(text)).toEqual(JSON.parse(text));
  });

  it('throws SyntaxError on invalid text', () => {
    expect(() => decodeJson('{"label":')).toThrow(SyntaxError);
  });

  it('keeps document order around integer-like keys', () => {
    const obj = decodeObject('{"b":1,"10":2,"a":3}');
    expect(Object.keys(obj)).toEqual(['10', 'b', 'a']);
    expect(entriesOf(obj)).toEqual([['b', 1], ['10', 2], ['a', 3]]);
  });

  it('keeps order for objects nested in arrays', () => {
    const root = decodeObject('{"list":[{"z":0,"2":1}]}');
    const list = root.list;
    expect(Array.isArray(list)).toBe(true);
    if (!Array.isArray(list) || !isJsonObject(list[0])) return;
    expect(entriesOf(list[0]).map(([k]) => k)).toEqual(['z', '2']);
  });

  it('gives a repeated key its first position and last value', () => {
    expect(entriesOf(decodeObject('{"1":"first","b":2,"1":"last"}'))).toEqual([['1', 'last'], ['b', 2]]);
  });

  it('treats __proto__ as an ordinary key', () => {
    const obj = decodeObject('{"__proto__":{"x":1},"0":2}');
    expect(Object.getPrototypeOf(obj)).toBe(Object.prototype);
    expect(entriesOf(obj)).toEqual([['__proto__', { x: 1 }], ['0', 2]]);
  });

  it('is not confused by braces and escapes inside strings', () => {
    const obj = decodeObject('{ "s" : "a\\"}{,[" , "7" : [1, -2.5e3, true, null], "e": {} }');
    expect(entriesOf(obj)).toEqual([['s', 'a"}{,['], ['7', [1, -2500, true, null]], ['e', {}]]);
  });

  it('leaves objects without integer-like keys in plain enumeration order', () => {
    const obj = decodeObject('{"b":1,"a":2}');
    expect(entriesOf(obj)).toEqual([['b', 1], ['a', 2]]);
  });
});
