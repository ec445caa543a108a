import { readFileSync } from "node:fs";
import { z } from "zod";

const hostActionsSchema = z.object({
  actions: z.array(z.string().regex(/^ACTION_[A-Z0-9_]+$/)).min(1),
  groups: z.array(z.string().regex(/^GROUP_[A-Z0-9_]+$/)).min(1),
  layerActions: z.array(z.string())
});

export interface HostActionCatalogue {
  readonly actions: ReadonlySet<string>;
  readonly groups: ReadonlySet<string>;
  readonly layerActions: ReadonlySet<string>;
}

export const NO_GROUP = "GROUP_NOGROUP";

let cached: HostActionCatalogue | undefined;

export function loadActionCatalogue(
  url: URL = new URL("../../data/host-actions.json", import.meta.url)
): HostActionCatalogue {
  const parsed = hostActionsSchema.parse(JSON.parse(readFileSync(url, "utf8")));
  const actions = new Set(parsed.actions);
  const unknownLayerActions = parsed.layerActions.filter((action) => !actions.has(action));
  if (unknownLayerActions.length > 0) {
    throw new Error(`Layer actions missing from action list: ${unknownLayerActions.join(", ")}`);
  }

  return {
    actions,
    groups: new Set(parsed.groups),
    layerActions: new Set(parsed.layerActions)
  };
}

export function actionCatalogue(): HostActionCatalogue {
  cached ??= loadActionCatalogue();
  return cached;
}
