// packages/core/src/json.ts
// JSON decoding that keeps the document order of object keys.
//
// JS objects enumerate integer-like keys ("0", "17") ahead of every other key,
// whatever order the text had. First-match search depends on document order,
// so objects whose enumeration order would differ get their real key order
// recorded here and read back through `entriesOf`.
import type { JsonObject, JsonValue } from './types';

const KEY_ORDER = new WeakMap<JsonObject, readonly string[]>();

// canonical array index: these are the keys objects move to the front
const INDEX_KEY = /^(?:0|[1-9]\d*)$/;
const MAX_INDEX = 2 ** 32 - 2;

function isIndexKey(key: string): boolean {
  return INDEX_KEY.test(key) && Number(key) <= MAX_INDEX;
}

function hasIndexKeys(value: unknown): boolean {
  if (Array.isArray(value)) return value.some(hasIndexKeys);
  if (typeof value !== 'object' || value === null) return false;
  for (const [k, v] of Object.entries(value)) {
    if (isIndexKey(k) || hasIndexKeys(v)) return true;
  }
  return false;
}

/** Entries of a mapping in document order. */
export function entriesOf(obj: JsonObject): [string, JsonValue][] {
  const keys = KEY_ORDER.get(obj);
  if (!keys) return Object.entries(obj);
  return keys.map((k): [string, JsonValue] => [k, obj[k]]);
}

/**
 * Parses JSON text. Throws the same SyntaxError as JSON.parse. Objects with
 * integer-like keys remember the order their keys appeared in.
 */
export function decodeJson(text: string): JsonValue {
  const parsed: JsonValue = JSON.parse(text);
  if (!hasIndexKeys(parsed)) return parsed;
  return new OrderedReader(text).read();
}

// Second pass over text JSON.parse has already accepted, so it does no
// validation of its own. Leaf tokens are decoded by JSON.parse.
class OrderedReader {
  private pos = 0;

  constructor(private readonly text: string) {}

  read(): JsonValue {
    this.skipWhitespace();
    switch (this.text[this.pos]) {
      case '{': return this.object();
      case '[': return this.array();
      case '"': return this.string();
      default: return this.literal();
    }
  }

  private object(): JsonObject {
    const obj: JsonObject = {};
    const keys: string[] = [];
    this.pos++;
    this.skipWhitespace();
    if (this.text[this.pos] === '}') {
      this.pos++;
      return obj;
    }
    for (;;) {
      this.skipWhitespace();
      const key = this.string();
      this.skipWhitespace();
      this.pos++; // ':'
      const value = this.read();
      // a repeated key keeps its first position and its last value
      if (!Object.hasOwn(obj, key)) keys.push(key);
      Object.defineProperty(obj, key, { value, enumerable: true, writable: true, configurable: true });
      this.skipWhitespace();
      if (this.text[this.pos++] === '}') break;
    }
    if (keys.some(isIndexKey)) KEY_ORDER.set(obj, keys);
    return obj;
  }

  private array(): JsonValue[] {
    const items: JsonValue[] = [];
    this.pos++;
    this.skipWhitespace();
    if (this.text[this.pos] === ']') {
      this.pos++;
      return items;
    }
    for (;;) {
      items.push(this.read());
      this.skipWhitespace();
      if (this.text[this.pos++] === ']') break;
    }
    return items;
  }

  private string(): string {
    const start = this.pos;
    this.pos++;
    while (this.text[this.pos] !== '"') {
      this.pos += this.text[this.pos] === '\\' ? 2 : 1;
    }
    this.pos++;
    const decoded: unknown = JSON.parse(this.text.slice(start, this.pos));
    return String(decoded);
  }

  // numbers, true, false, null
  private literal(): JsonValue {
    const start = this.pos;
    while (this.pos < this.text.length && !/[\s,\]}]/.test(this.text[this.pos])) this.pos++;
    const decoded: JsonValue = JSON.parse(this.text.slice(start, this.pos));
    return decoded;
  }

  private skipWhitespace() {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) this.pos++;
  }
}
