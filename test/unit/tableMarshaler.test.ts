import { describe, expect, it } from "vitest";
import {
  decodeIndexedMap,
  decodeRecord,
  decodeSequence,
  encodeSequence,
  requireTable
} from "../../src/bridge/tableMarshaler.js";
import { registerUiTableSchema } from "../../src/types/contracts.js";
import { type AppError, ValidationError } from "../../src/utils/errors.js";

describe("table marshaler", () => {
  it("decodes arrays and integer-keyed tables in order", () => {
    expect(decodeSequence([1, 2, 3], "x", "number")).toEqual([1, 2, 3]);
    expect(decodeSequence({ 2: 20, 1: 10, 10: 100 }, "x", "number")).toEqual([10, 20, 100]);
    expect(decodeSequence(["1.5", 2], "y", "number")).toEqual([1.5, 2]);
    expect(decodeSequence([], "x", "number")).toEqual([]);
  });

  it("rejects tables that are not sequences", () => {
    expect(() => decodeSequence({ a: 1 }, "x", "number")).toThrow("Bad 'x': sequence expected, found key 'a'");
    expect(() => decodeSequence([1, "b"], "x", "number")).toThrow("Bad 'x' entry 1 (number expected, got string)");
    expect(() => decodeSequence(5, "x", "number")).toThrow("Bad 'x' (table expected, got number)");
    expect(() => decodeSequence([1, , 3], "x", "number")).toThrow("Bad 'x' entry 1 (number expected, got undefined)");
    expect(() => decodeIndexedMap(["Yes", , "No"], "buttons", "string")).toThrow(ValidationError);
    expect(() => requireTable("menu", "argument #1 to 'registerUi'")).toThrow(ValidationError);
  });

  it("keeps the keys of indexed maps", () => {
    expect([...decodeIndexedMap({ 1: "Yes", 2: "No" }, "buttons", "string")]).toEqual([
      [1, "Yes"],
      [2, "No"]
    ]);
    expect([...decodeIndexedMap(["Yes", "No"], "buttons", "string")]).toEqual([
      [1, "Yes"],
      [2, "No"]
    ]);
    expect([...decodeIndexedMap({ 0: "Cancel", 5: "Retry" }, "buttons", "string")]).toEqual([
      [0, "Cancel"],
      [5, "Retry"]
    ]);
  });

  it("reads record fields independently", () => {
    const warnings: AppError[] = [];
    const fields = decodeRecord({ menu: "Hi", callback: 5, accelerator: true, extra: 1 }, registerUiTableSchema, (w) => {
      warnings.push(w);
    });

    expect(fields).toEqual({ menu: "Hi", callback: "5" });
    expect(warnings.map((warning) => warning.message)).toEqual([
      "Ignoring field 'accelerator': unexpected boolean value"
    ]);
  });

  it("treats null fields as absent", () => {
    expect(decodeRecord({ menu: null, callback: "run" }, registerUiTableSchema)).toEqual({ callback: "run" });
  });

  it("encodes sequences as arrays", () => {
    expect(encodeSequence(new Set(["a", "b"]), (value, index) => `${index}:${value}`)).toEqual(["0:a", "1:b"]);
  });
});
