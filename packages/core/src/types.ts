// --------------------
// JSON record tree
// --------------------
export type JsonScalar = string | number | boolean | null;
export type JsonArray = JsonValue[];
export interface JsonObject { [key: string]: JsonValue }
export type JsonValue = JsonScalar | JsonObject | JsonArray;

// Every record is a mapping at the root.
export type FeatureRecord = JsonObject;

// Closed view over a node; traversal switches on `kind` instead of probing types ad hoc.
export type NodeView =
  | { kind: 'scalar'; value: JsonScalar }
  | { kind: 'mapping'; value: JsonObject }
  | { kind: 'sequence'; value: JsonArray };

export function viewNode(node: JsonValue): NodeView {
  if (Array.isArray(node)) return { kind: 'sequence', value: node };
  if (node !== null && typeof node === 'object') return { kind: 'mapping', value: node };
  return { kind: 'scalar', value: node };
}

export function isJsonObject(v: unknown): v is JsonObject {
  // only sound for values that came out of a JSON decoder
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

// --------------------
// Extraction outcome
// --------------------
export type Outcome<T = JsonValue> =
  | { found: true; value: T }
  | { found: false };

export const NOT_FOUND: Outcome<never> = { found: false };

export function found<T>(value: T): Outcome<T> {
  return { found: true, value };
}

// --------------------
// Rows
// --------------------
/**
 * A number the extractors computed (a mean, or the zero of an empty table)
 * rather than copied from the record. CSV writes it as `17408.0` when it is
 * integral; JSON serialization sees a plain number.
 */
export class FloatValue {
  constructor(readonly value: number) {}

  toJSON(): number {
    return this.value;
  }
}

export function float(value: number): FloatValue {
  return new FloatValue(value);
}

// what an extractor hands back before the scalar check
export type ResolvedValue = JsonValue | FloatValue;

// JSON null leaves are carried through and written as empty cells.
export type CellValue = JsonScalar | FloatValue;
export type Row = CellValue[];

// --------------------
// Option enums
// --------------------
export type ErrorMode = 'abort-on-first-error' | 'skip-and-report';

// `documented` reads each directory's own field; `legacy` keeps the historical
// column values (debug_size -> virtual_address, export_rva -> size).
export type DirectoryFieldMode = 'documented' | 'legacy';
