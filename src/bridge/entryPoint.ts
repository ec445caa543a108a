import type { HostPage } from "../host/types.js";
import { StateError } from "../utils/errors.js";
import type { PluginContext } from "./context.js";

export const ENTRY_POINT_FAMILIES = ["ui", "document", "stroke", "tool", "dialog"] as const;
export type EntryPointFamily = (typeof ENTRY_POINT_FAMILIES)[number];

/** Body of an entry point: runs to completion before control returns to the script. */
export type EntryPointBody = (context: PluginContext, args: readonly unknown[]) => unknown;

export interface EntryPointDefinition {
  name: string;
  family: EntryPointFamily;
  /** One-line usage shown in the catalogue. */
  usage: string;
  body: EntryPointBody;
}

export function defineEntryPoints(
  family: EntryPointFamily,
  entries: Record<string, { usage: string; body: EntryPointBody }>
): EntryPointDefinition[] {
  return Object.entries(entries).map(([name, entry]) => ({ name, family, ...entry }));
}

export function requireCurrentPage(context: PluginContext): HostPage {
  const page = context.control.getCurrentPage();
  if (!page) {
    throw new StateError("No page!");
  }
  return page;
}
