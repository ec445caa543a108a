import { copyFileSync, renameSync, unlinkSync } from "node:fs";
import { ValidationError } from "../../utils/errors.js";
import { isAbsent, optionalArg, requireArg } from "../coercion.js";
import { decodeIndexedMap, decodeSequence } from "../tableMarshaler.js";
import { defineEntryPoints } from "../entryPoint.js";

/** Result of `glib_rename` on failure: no value, then the reason. */
export type RenameFailure = [null, string];

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function renameFailure(error: unknown): RenameFailure {
  const message = error instanceof Error ? error.message : String(error);
  return [null, `${message} (error code: ${errorCode(error) ?? "UNKNOWN"})`];
}

/**
 * Moves `from` onto `to`, replacing an existing file. A move across file
 * systems falls back to copy and unlink.
 */
export function renameFile(from: string, to: string): 1 | RenameFailure {
  try {
    renameSync(from, to);
    return 1;
  } catch (error) {
    if (errorCode(error) !== "EXDEV") {
      return renameFailure(error);
    }
  }

  try {
    copyFileSync(from, to);
    unlinkSync(from);
    return 1;
  } catch (error) {
    return renameFailure(error);
  }
}

export const dialogEntryPoints = defineEntryPoints("dialog", {
  msgbox: {
    usage: 'const result = app.msgbox("Test123", { 1: "Yes", 2: "No" })',
    body: (context, args) => {
      const message = requireArg(args, 0, "string", "message");
      if (isAbsent(args[1])) {
        throw new ValidationError("Missing argument #2 'buttons' (table expected)", { expected: "table" });
      }
      const buttons = decodeIndexedMap(args[1], "buttons", "string");
      return context.control.getDialogs().showPluginMessage(context.name, message, buttons);
    }
  },

  saveAs: {
    usage: 'const path = app.saveAs("foo.png")',
    body: (context, args) => {
      const suggestion = optionalArg(args, 0, "string", "suggestion", "Untitled", context.warnSink);
      return context.control.getDialogs().chooseSaveFile(suggestion);
    }
  },

  getFilePath: {
    usage: 'const path = app.getFilePath(["*.bmp", "*.png"])',
    body: (context, args) => {
      const filters = isAbsent(args[0]) ? [] : decodeSequence(args[0], "filters", "string");
      return context.control.getDialogs().chooseOpenFile(filters);
    }
  },

  glib_rename: {
    usage: 'const renamed = app.glib_rename("path/to/foo", "other/bar") // 1, or [null, reason]',
    body: (context, args) => {
      const from = requireArg(args, 0, "string", "from");
      const to = requireArg(args, 1, "string", "to");
      const result = renameFile(from, to);
      if (result !== 1) {
        context.logger.debug(`Rename ${from} -> ${to} failed: ${result[1]}`);
      }
      return result;
    }
  }
});
