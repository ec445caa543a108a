import { SIDEBAR_ACTIONS, registerUiTableSchema, uiActionTableSchema, type SidebarAction } from "../../types/contracts.js";
import { NO_GROUP, actionCatalogue } from "../../host/catalogue.js";
import { DomainError, ValidationError } from "../../utils/errors.js";
import { requireArg } from "../coercion.js";
import { decodeRecord, requireTable } from "../tableMarshaler.js";
import { defineEntryPoints } from "../entryPoint.js";

function checkAction(action: string): string {
  if (!actionCatalogue().actions.has(action)) {
    throw new DomainError(`Unknown action: ${action}`, { action });
  }
  return action;
}

function checkGroup(group: string): string {
  if (!actionCatalogue().groups.has(group)) {
    throw new DomainError(`Unknown action group: ${group}`, { group });
  }
  return group;
}

function isSidebarAction(value: string): value is SidebarAction {
  return SIDEBAR_ACTIONS.some((action) => action === value);
}

export const uiEntryPoints = defineEntryPoints("ui", {
  registerUi: {
    usage: 'app.registerUi({ menu: "Label", callback: "fn", accelerator: "<Control>a" })',
    body: (context, args) => {
      const table = requireTable(args[0], "argument #1 to 'registerUi'");
      const fields = decodeRecord(table, registerUiTableSchema, context.warnSink);
      if (fields.callback === undefined) {
        throw new ValidationError("Missing callback function!");
      }

      const registration = context.registerMenu(fields.menu ?? "", fields.callback, fields.accelerator ?? "");
      context.logger.debug(`Registered menu ${registration.menuId} -> ${registration.callback}`);
      return { menuId: registration.menuId, toolbarId: -1 };
    }
  },

  uiAction: {
    usage: 'app.uiAction({ action: "ACTION_GRID_SNAPPING", group: "GROUP_GRID_SNAPPING", enabled: true })',
    body: (context, args) => {
      const table = requireTable(args[0], "argument #1 to 'uiAction'");
      const fields = decodeRecord(table, uiActionTableSchema, context.warnSink);
      if (fields.action === undefined) {
        throw new ValidationError("Missing action!");
      }

      const action = checkAction(fields.action);
      const group = fields.group === undefined ? NO_GROUP : checkGroup(fields.group);
      context.control.actionPerformed(action, group, fields.enabled ?? true);
      return undefined;
    }
  },

  uiActionSelected: {
    usage: 'app.uiActionSelected("GROUP_GRID_SNAPPING", "ACTION_GRID_SNAPPING")',
    body: (context, args) => {
      const group = checkGroup(requireArg(args, 0, "string", "group"));
      const action = checkAction(requireArg(args, 1, "string", "action"));
      context.control.fireActionSelected(group, action);
      return undefined;
    }
  },

  sidebarAction: {
    usage: 'app.sidebarAction("MOVE_DOWN")',
    body: (context, args) => {
      const action = requireArg(args, 0, "string", "action");
      if (!isSidebarAction(action)) {
        throw new DomainError(`Unknown action: ${action}`, { action, known: SIDEBAR_ACTIONS });
      }
      context.control.getSidebarToolbar().runAction(action);
      return undefined;
    }
  },

  layerAction: {
    usage: 'app.layerAction("ACTION_DELETE_LAYER")',
    body: (context, args) => {
      const action = checkAction(requireArg(args, 0, "string", "action"));
      if (!actionCatalogue().layerActions.has(action)) {
        throw new DomainError(`${action} is not a layer action`, { action });
      }
      context.control.getLayerController().actionPerformed(action);
      return undefined;
    }
  }
});
