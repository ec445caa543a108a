import { z } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { BridgeService } from "../domain/bridgeService.js";
import { asAppError } from "../utils/errors.js";
import { dialogResponsesSchema, documentSeedSchema } from "../types/contracts.js";

const standardOutputSchema = z.object({
  ok: z.boolean(),
  data: z.record(z.string(), z.unknown()).optional(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      details: z.record(z.string(), z.unknown()).optional()
    })
    .optional()
});

function success(data: Record<string, unknown>, text: string) {
  return {
    content: [{ type: "text" as const, text }],
    structuredContent: {
      ok: true,
      data
    }
  };
}

function failure(error: unknown) {
  const appError = asAppError(error);
  return {
    isError: true,
    content: [{ type: "text" as const, text: `${appError.code}: ${appError.message}` }],
    structuredContent: {
      ok: false,
      error: {
        code: appError.code,
        message: appError.message,
        details: appError.details
      }
    }
  };
}

export function registerTools(server: McpServer, bridge: BridgeService): void {
  const readOnlyAnnotations = { readOnlyHint: true, idempotentHint: true, destructiveHint: false, openWorldHint: false };
  const mutatingAnnotations = { readOnlyHint: false, idempotentHint: false, destructiveHint: true, openWorldHint: false };

  server.registerTool(
    "plugins.list",
    {
      description: "List loaded plugins with their registered menu entries",
      outputSchema: standardOutputSchema,
      annotations: readOnlyAnnotations
    },
    async () => {
      try {
        const plugins = bridge.listPlugins();
        return success({ plugins, count: plugins.length }, `Listed ${plugins.length} plugins`);
      } catch (error) {
        return failure(error);
      }
    }
  );

  server.registerTool(
    "plugins.reload",
    {
      description: "Unload every plugin and load the plugin folder again",
      outputSchema: standardOutputSchema,
      annotations: mutatingAnnotations
    },
    async () => {
      try {
        const report = await bridge.reloadPlugins();
        return success({ ...report }, `Loaded ${report.loaded.length} plugins, ${report.errors.length} failed`);
      } catch (error) {
        return failure(error);
      }
    }
  );

  server.registerTool(
    "plugins.invoke",
    {
      description: "Run a plugin callback, by menu id or by plugin name and callback name",
      inputSchema: {
        menuId: z.number().int().positive().optional(),
        plugin: z.string().min(1).optional(),
        callback: z.string().min(1).optional(),
        dialogResponses: dialogResponsesSchema.optional()
      },
      outputSchema: standardOutputSchema,
      annotations: mutatingAnnotations
    },
    async ({ menuId, plugin, callback, dialogResponses }) => {
      try {
        const invocation = await bridge.invoke({ menuId, plugin, callback }, dialogResponses);
        const label = menuId !== undefined ? `menu ${menuId}` : `${plugin ?? "?"}.${callback ?? "?"}`;
        return success({ ...invocation }, `Ran ${label} (${invocation.events.length} host events)`);
      } catch (error) {
        return failure(error);
      }
    }
  );

  server.registerTool(
    "script.run",
    {
      description: "Evaluate a script against the app library in a throwaway interpreter",
      inputSchema: {
        source: z.string().min(1).max(200_000),
        dialogResponses: dialogResponsesSchema.optional()
      },
      outputSchema: standardOutputSchema,
      annotations: mutatingAnnotations
    },
    async ({ source, dialogResponses }) => {
      try {
        const invocation = await bridge.runScript(source, dialogResponses);
        return success({ ...invocation }, `Script finished (${invocation.events.length} host events)`);
      } catch (error) {
        return failure(error);
      }
    }
  );

  server.registerTool(
    "document.structure",
    {
      description: "Pages, layers and current selection of the open document",
      outputSchema: standardOutputSchema,
      annotations: readOnlyAnnotations
    },
    async () => {
      try {
        const structure = bridge.documentStructure();
        return success({ ...structure }, `Document has ${structure.pages.length} pages`);
      } catch (error) {
        return failure(error);
      }
    }
  );

  server.registerTool(
    "document.reset",
    {
      description: "Replace the open document with a fresh one and restart the plugins",
      inputSchema: {
        seed: documentSeedSchema.optional()
      },
      outputSchema: standardOutputSchema,
      annotations: mutatingAnnotations
    },
    async ({ seed }) => {
      try {
        const report = await bridge.resetDocument(seed);
        const pages = bridge.host.getDocument().getPageCount();
        return success({ pages, plugins: report }, `Document reset with ${pages} pages`);
      } catch (error) {
        return failure(error);
      }
    }
  );
}
