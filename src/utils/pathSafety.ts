import { resolve, relative, isAbsolute } from "node:path";
import { ValidationError } from "./errors.js";

export function ensureInsideRoot(root: string, candidate: string): string {
  const absoluteRoot = resolve(root);
  const absoluteCandidate = resolve(absoluteRoot, candidate);
  const rel = relative(absoluteRoot, absoluteCandidate);

  if (rel === ".." || rel.startsWith(`..${process.platform === "win32" ? "\\" : "/"}`) || isAbsolute(rel)) {
    throw new ValidationError(`Path escapes root: ${candidate}`, {
      root: absoluteRoot,
      candidate: absoluteCandidate
    });
  }

  return absoluteCandidate;
}

/** Plugin folders double as plugin names, so they stay plain. */
export function sanitizePluginFolder(folder: string): string {
  if (!/^[a-zA-Z0-9 _.-]+$/.test(folder) || folder.startsWith(".")) {
    throw new ValidationError("Invalid plugin folder name", { folder });
  }

  return folder;
}
