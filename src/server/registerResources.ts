import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { describeCatalogue } from "../bridge/registry.js";
import type { BridgeService } from "../domain/bridgeService.js";

function asJsonText(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export const CATALOGUE_URI = "inkscript://catalogue";
export const DOCUMENT_STRUCTURE_URI = "inkscript://document/structure";

export function registerResources(server: McpServer, bridge: BridgeService): void {
  server.registerResource(
    "catalogue",
    CATALOGUE_URI,
    {
      title: "App Library",
      description: "Functions scripts can call on the global app object",
      mimeType: "application/json"
    },
    async () => {
      const entryPoints = describeCatalogue();
      return {
        contents: [
          {
            uri: CATALOGUE_URI,
            mimeType: "application/json",
            text: asJsonText({ entryPoints, count: entryPoints.length })
          }
        ]
      };
    }
  );

  server.registerResource(
    "document-structure",
    DOCUMENT_STRUCTURE_URI,
    {
      title: "Document Structure",
      description: "Pages and layers of the open document, as getDocumentStructure returns them",
      mimeType: "application/json"
    },
    async () => ({
      contents: [
        {
          uri: DOCUMENT_STRUCTURE_URI,
          mimeType: "application/json",
          text: asJsonText(bridge.documentStructure())
        }
      ]
    })
  );
}
