import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { BridgeService } from "../domain/bridgeService.js";
import type { DocumentSeedInput } from "../types/contracts.js";
import type { Logger } from "../utils/logger.js";
import { registerTools } from "./registerTools.js";
import { registerResources } from "./registerResources.js";

export interface BridgeMcpServices {
  server: McpServer;
  bridge: BridgeService;
}

export interface CreateBridgeServerOptions {
  pluginDir: string;
  logger: Logger;
  version?: string;
  displayDpi?: number;
  seed?: DocumentSeedInput;
}

export async function createBridgeMcpServer(options: CreateBridgeServerOptions): Promise<BridgeMcpServices> {
  const bridge = new BridgeService({
    pluginDir: options.pluginDir,
    logger: options.logger,
    displayDpi: options.displayDpi,
    seed: options.seed
  });
  await bridge.start();

  const server = new McpServer(
    {
      name: "inkscript-bridge",
      version: options.version ?? "0.1.0"
    },
    {
      capabilities: {
        tools: { listChanged: true },
        resources: { listChanged: true, subscribe: false }
      },
      instructions:
        "Use plugins.* tools to run plugin menu entries, script.run for ad-hoc scripts against the app library, and resources for the function catalogue and the document structure."
    }
  );

  registerTools(server, bridge);
  registerResources(server, bridge);

  return {
    server,
    bridge
  };
}
