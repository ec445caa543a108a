import type { z } from "zod";
import {
  MAX_RGB_COLOR,
  scriptBooleanSchema,
  scriptIntegerSchema,
  scriptNumberSchema,
  scriptStringSchema
} from "../types/contracts.js";
import { type AppError, DomainError, ValidationError } from "../utils/errors.js";

export type ValueKind = "integer" | "number" | "string" | "boolean";

export interface ValueKindMap {
  integer: number;
  number: number;
  string: string;
  boolean: boolean;
}

/** Receives the non-fatal failures of a call; the call itself goes on. */
export type WarningSink = (warning: AppError) => void;

const KIND_SCHEMAS: { [K in ValueKind]: z.ZodType<ValueKindMap[K], z.ZodTypeDef, unknown> } = {
  integer: scriptIntegerSchema,
  number: scriptNumberSchema,
  string: scriptStringSchema,
  boolean: scriptBooleanSchema
};

export function isAbsent(value: unknown): value is undefined | null {
  return value === undefined || value === null;
}

export function describeValue(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (typeof value === "object") {
    return Array.isArray(value) ? "array" : "table";
  }
  return typeof value;
}

/** Converts one value to `kind`, or returns undefined when it cannot. */
export function coerceValue<K extends ValueKind>(value: unknown, kind: K): ValueKindMap[K] | undefined {
  const schema: z.ZodType<ValueKindMap[K], z.ZodTypeDef, unknown> = KIND_SCHEMAS[kind];
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function requireValue<K extends ValueKind>(value: unknown, kind: K, label: string): ValueKindMap[K] {
  if (isAbsent(value)) {
    throw new ValidationError(`Missing ${label} (${kind} expected)`, { expected: kind });
  }

  const coerced = coerceValue(value, kind);
  if (coerced === undefined) {
    throw new ValidationError(`Bad ${label} (${kind} expected, got ${describeValue(value)})`, {
      expected: kind,
      got: describeValue(value)
    });
  }

  return coerced;
}

function optionalValue<K extends ValueKind>(
  value: unknown,
  kind: K,
  label: string,
  fallback: ValueKindMap[K],
  warn?: WarningSink
): ValueKindMap[K] {
  if (isAbsent(value)) {
    return fallback;
  }

  const coerced = coerceValue(value, kind);
  if (coerced === undefined) {
    warn?.(
      new ValidationError(`Ignoring ${label}: ${kind} expected, got ${describeValue(value)}`, {
        expected: kind,
        got: describeValue(value)
      })
    );
    return fallback;
  }

  return coerced;
}

export function requireArg<K extends ValueKind>(
  args: readonly unknown[],
  index: number,
  kind: K,
  name: string
): ValueKindMap[K] {
  return requireValue(args[index], kind, `argument #${index + 1} '${name}'`);
}

export function optionalArg<K extends ValueKind>(
  args: readonly unknown[],
  index: number,
  kind: K,
  name: string,
  fallback: ValueKindMap[K],
  warn?: WarningSink
): ValueKindMap[K] {
  return optionalValue(args[index], kind, `argument #${index + 1} '${name}'`, fallback, warn);
}

export function requireField<K extends ValueKind>(
  table: Readonly<Record<string, unknown>>,
  field: string,
  kind: K
): ValueKindMap[K] {
  return requireValue(table[field], kind, `field '${field}'`);
}

export function optionalField<K extends ValueKind>(
  table: Readonly<Record<string, unknown>>,
  field: string,
  kind: K,
  fallback: ValueKindMap[K],
  warn?: WarningSink
): ValueKindMap[K] {
  return optionalValue(table[field], kind, `field '${field}'`, fallback, warn);
}

/** RGB colors are 0xRRGGBB; anything else is outside the host's color domain. */
export function checkColor(color: number): number {
  if (!Number.isInteger(color) || color < 0 || color > MAX_RGB_COLOR) {
    throw new DomainError(`Color 0x${formatHex(color)} is no valid RGB color`, { color });
  }

  return color;
}

function formatHex(value: number): string {
  return Number.isInteger(value) && value >= 0 ? value.toString(16) : String(value);
}
