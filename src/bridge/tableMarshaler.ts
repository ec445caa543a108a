import { z } from "zod";
import { coerceValue, describeValue, isAbsent, type ValueKind, type ValueKindMap, type WarningSink } from "./coercion.js";
import { ValidationError } from "../utils/errors.js";

/** A table as scripts build it: an array, or an object keyed by names or positions. */
export type ScriptTable = Readonly<Record<string, unknown>>;

const INTEGER_KEY = /^(0|-?[1-9]\d*)$/;

export function isScriptTable(value: unknown): value is ScriptTable {
  return typeof value === "object" && value !== null;
}

export function requireTable(value: unknown, label: string): ScriptTable {
  if (!isScriptTable(value)) {
    throw new ValidationError(`Bad ${label} (table expected, got ${describeValue(value)})`, {
      expected: "table",
      got: describeValue(value)
    });
  }

  return value;
}

/**
 * Ordered entries of an array-shaped table. Arrays keep their index order;
 * objects must be keyed by integers and are walked in ascending key order, so
 * `{ 1: a, 2: b }` and `[a, b]` decode alike.
 */
function sequenceEntries(table: ScriptTable, name: string): Array<[number, unknown]> {
  if (Array.isArray(table)) {
    // holes read as undefined entries
    const entries: Array<[number, unknown]> = [];
    for (let index = 0; index < table.length; index += 1) {
      entries.push([index, table[index]]);
    }
    return entries;
  }

  const entries: Array<[number, unknown]> = [];
  for (const [key, value] of Object.entries(table)) {
    if (!INTEGER_KEY.test(key)) {
      throw new ValidationError(`Bad '${name}': sequence expected, found key '${key}'`, { key });
    }
    entries.push([Number(key), value]);
  }

  return entries.sort((a, b) => a[0] - b[0]);
}

export function decodeSequence<K extends ValueKind>(value: unknown, name: string, kind: K): Array<ValueKindMap[K]> {
  const table = requireTable(value, `'${name}'`);

  return sequenceEntries(table, name).map(([key, entry]) => {
    const coerced = coerceValue(entry, kind);
    if (coerced === undefined) {
      throw new ValidationError(`Bad '${name}' entry ${key} (${kind} expected, got ${describeValue(entry)})`, {
        key,
        expected: kind
      });
    }
    return coerced;
  });
}

/** Integer-keyed map whose keys carry meaning of their own (e.g. button ids). */
export function decodeIndexedMap<K extends ValueKind>(
  value: unknown,
  name: string,
  kind: K
): Map<number, ValueKindMap[K]> {
  const table = requireTable(value, `'${name}'`);
  const decoded = decodeSequence(table, name, kind);
  const keys = sequenceEntries(table, name).map(([key]) => (Array.isArray(table) ? key + 1 : key));

  return new Map(keys.map((key, index): [number, ValueKindMap[K]] => [key, decoded[index]]));
}

/**
 * Reads the named fields of a record-shaped table. Fields are independent:
 * an absent field stays undefined and a field of the wrong type is reported
 * to `warn` and dropped, without affecting the others.
 */
export function decodeRecord<S extends z.ZodRawShape>(table: ScriptTable, shape: S, warn?: WarningSink) {
  const cleaned: Record<string, unknown> = {};

  for (const [field, schema] of Object.entries(shape)) {
    const raw = table[field];
    if (isAbsent(raw)) {
      continue;
    }

    if (schema.safeParse(raw).success) {
      cleaned[field] = raw;
    } else {
      warn?.(
        new ValidationError(`Ignoring field '${field}': unexpected ${describeValue(raw)} value`, {
          field,
          got: describeValue(raw)
        })
      );
    }
  }

  return z.object(shape).partial().parse(cleaned);
}

export function encodeSequence<T, R>(items: Iterable<T>, encode: (item: T, index: number) => R): R[] {
  return Array.from(items, encode);
}
