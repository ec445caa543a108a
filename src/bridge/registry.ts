import { type AppError, asAppError } from "../utils/errors.js";
import type { ContextRegistry } from "./context.js";
import type { EntryPointDefinition, EntryPointFamily } from "./entryPoint.js";
import { dialogEntryPoints } from "./functions/dialogs.js";
import { documentEntryPoints } from "./functions/document.js";
import { strokeEntryPoints } from "./functions/strokes.js";
import { toolEntryPoints } from "./functions/tools.js";
import { uiEntryPoints } from "./functions/ui.js";

export type BoundEntryPoint = (...args: unknown[]) => unknown;

/** The functions a script sees as `app.<name>`. */
export type AppLibrary = Readonly<Record<string, BoundEntryPoint>>;

export const ENTRY_POINTS: readonly EntryPointDefinition[] = [
  ...uiEntryPoints,
  ...documentEntryPoints,
  ...toolEntryPoints,
  ...strokeEntryPoints,
  ...dialogEntryPoints
];

export interface CatalogueEntry {
  name: string;
  family: EntryPointFamily;
  usage: string;
}

export function describeCatalogue(): CatalogueEntry[] {
  return ENTRY_POINTS.map(({ name, family, usage }) => ({ name, family, usage }));
}

function annotate(error: unknown, entryPoint: string): AppError {
  const appError = asAppError(error);
  appError.details = { ...appError.details, entryPoint };
  return appError;
}

/**
 * Builds the `app` library for one interpreter. The functions hold on to the
 * interpreter id only; the plugin context is looked up again on every call,
 * so a released interpreter fails with a StateError instead of reaching a
 * stale context.
 */
export function bindAppLibrary(registry: ContextRegistry, interpreterId: string): AppLibrary {
  const library: Record<string, BoundEntryPoint> = {};

  for (const definition of ENTRY_POINTS) {
    library[definition.name] = (...args: unknown[]) => {
      const context = registry.resolve(interpreterId);
      try {
        return definition.body(context, args);
      } catch (error) {
        const appError = annotate(error, definition.name);
        context.logger.debug(`app.${definition.name} failed: ${appError.code}: ${appError.message}`);
        throw appError;
      }
    };
  }

  return Object.freeze(library);
}
