import { TOOL_TYPES, changeToolColorTableSchema, type ToolType } from "../../types/contracts.js";
import type { HostControl } from "../../host/types.js";
import { CapabilityError, DomainError } from "../../utils/errors.js";
import { checkColor, requireArg } from "../coercion.js";
import { decodeRecord, requireTable } from "../tableMarshaler.js";
import { defineEntryPoints } from "../entryPoint.js";
import { snapshotTool } from "../strokeDraft.js";

function toToolType(value: string): ToolType | undefined {
  const normalized = value.toLowerCase();
  return TOOL_TYPES.find((type) => type === normalized);
}

/**
 * Per-mode description of a tool. Unknown modes read as an empty record
 * rather than failing, unlike the setters.
 */
export function describeTool(control: HostControl, mode: string): Record<string, unknown> {
  const toolHandler = control.getToolHandler();

  switch (mode) {
    case "active": {
      const type = toolHandler.getActiveToolType();
      if (type === undefined) {
        return {};
      }
      const snapshot = snapshotTool(toolHandler.getTool(type));
      return {
        type,
        size: { name: snapshot.sizeName, value: snapshot.thickness },
        color: snapshot.color,
        fillOpacity: snapshot.fillOpacity,
        drawingType: snapshot.drawingType,
        lineStyle: snapshot.lineStyle
      };
    }
    case "pen": {
      const snapshot = snapshotTool(toolHandler.getTool("pen"));
      return {
        size: { name: snapshot.sizeName, value: snapshot.thickness },
        color: snapshot.color,
        drawingType: snapshot.drawingType,
        lineStyle: snapshot.lineStyle,
        filled: snapshot.filled,
        fillOpacity: snapshot.fillOpacity
      };
    }
    case "highlighter": {
      const snapshot = snapshotTool(toolHandler.getTool("highlighter"));
      return {
        size: { name: snapshot.sizeName, value: snapshot.thickness },
        color: snapshot.color,
        drawingType: snapshot.drawingType,
        filled: snapshot.filled,
        fillOpacity: snapshot.fillOpacity
      };
    }
    case "eraser": {
      const snapshot = snapshotTool(toolHandler.getTool("eraser"));
      return {
        type: toolHandler.getEraserType(),
        size: { name: snapshot.sizeName, value: snapshot.thickness }
      };
    }
    case "text": {
      const font = control.getSettings().getFont();
      return {
        font: { name: font.name, size: font.size },
        color: toolHandler.getTool("text").getColor()
      };
    }
    default:
      return {};
  }
}

export const toolEntryPoints = defineEntryPoints("tool", {
  getToolInfo: {
    usage: 'const penInfo = app.getToolInfo("pen")',
    body: (context, args) => describeTool(context.control, requireArg(args, 0, "string", "mode"))
  },

  changeToolColor: {
    usage: 'app.changeToolColor({ color: 0xff00ff, tool: "pen", selection: true })',
    body: (context, args) => {
      const table = requireTable(args[0], "argument #1 to 'changeToolColor'");
      const fields = decodeRecord(table, changeToolColorTableSchema, context.warnSink);
      const control = context.control;
      const toolHandler = control.getToolHandler();

      const toolType = fields.tool === undefined ? toolHandler.getActiveToolType() : toToolType(fields.tool);
      if (toolType === undefined) {
        context.warn(
          new DomainError(`tool "${fields.tool ?? "none"}" is not valid or no tool has been selected`, {
            tool: fields.tool
          })
        );
        return undefined;
      }

      const tool = toolHandler.getTool(toolType);
      if (!tool.hasCapability("color")) {
        context.warn(new CapabilityError(`tool "${toolType}" has no color capability`, { tool: toolType }));
        return undefined;
      }

      let color = tool.getColor();
      if (fields.color !== undefined) {
        try {
          color = checkColor(fields.color);
        } catch (error) {
          if (!(error instanceof DomainError)) {
            throw error;
          }
          context.warn(error);
          return undefined;
        }
      }

      tool.setColor(color);
      control.toolColorChanged();
      if (fields.selection ?? false) {
        control.changeColorOfSelection();
      }
      return undefined;
    }
  }
});
