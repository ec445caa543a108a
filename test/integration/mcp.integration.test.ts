import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { createBridgeMcpServer, type BridgeMcpServices } from "../../src/server/createServer.js";
import { CATALOGUE_URI, DOCUMENT_STRUCTURE_URI } from "../../src/server/registerResources.js";
import { StderrLogger } from "../../src/utils/logger.js";

const HELLO = `
function initUi() {
  app.registerUi({ menu: "Say hello", callback: "hello" });
}

function hello() {
  app.msgbox("Hello", { 1: "OK", 2: "Cancel" });
  return "greeted";
}
`;

describe("MCP in-memory integration", () => {
  let rootDir: string;
  let services: BridgeMcpServices;
  let client: Client;

  async function readJson(uri: string): Promise<unknown> {
    const resource = await client.readResource({ uri });
    const [content] = resource.contents;
    if (!content || !("text" in content) || typeof content.text !== "string") {
      throw new Error(`resource ${uri} has no text content`);
    }
    return JSON.parse(content.text);
  }

  beforeEach(async () => {
    rootDir = await mkdtemp(join(tmpdir(), "inkscript-it-"));
    await mkdir(join(rootDir, "Hello"));
    await writeFile(join(rootDir, "Hello", "plugin.json"), JSON.stringify({ description: "Greets" }));
    await writeFile(join(rootDir, "Hello", "main.js"), HELLO);

    services = await createBridgeMcpServer({
      pluginDir: rootDir,
      logger: new StderrLogger("it", "silent"),
      version: "test"
    });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({
      name: "test-client",
      version: "1.0.0"
    });

    await services.server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await services.server.close();
    services.bridge.close();
    await rm(rootDir, { recursive: true, force: true });
  });

  it("exposes the bridge tools", async () => {
    const tools = await client.listTools();

    expect(tools.tools.map((tool) => tool.name).sort()).toEqual([
      "document.reset",
      "document.structure",
      "plugins.invoke",
      "plugins.list",
      "plugins.reload",
      "script.run"
    ]);
  });

  it("lists plugins and runs their menu entries with scripted dialogs", async () => {
    const listed = await client.callTool({ name: "plugins.list", arguments: {} });
    expect(listed.structuredContent).toEqual({
      ok: true,
      data: {
        plugins: [
          {
            name: "Hello",
            folder: "Hello",
            description: "Greets",
            author: "",
            version: "0.0.0",
            menus: [{ menuId: 1, menu: "Say hello", callback: "hello", accelerator: "" }]
          }
        ],
        count: 1
      }
    });

    const invoked = await client.callTool({
      name: "plugins.invoke",
      arguments: { menuId: 1, dialogResponses: { messageButtons: [2] } }
    });
    expect(invoked.isError).toBeFalsy();
    expect(invoked.structuredContent).toEqual({
      ok: true,
      data: {
        result: "greeted",
        events: [],
        dialogs: [
          {
            kind: "message",
            plugin: "Hello",
            message: "Hello",
            buttons: [
              [1, "OK"],
              [2, "Cancel"]
            ],
            answer: 2
          }
        ]
      }
    });
  });

  it("runs ad-hoc scripts against the open document", async () => {
    const ran = await client.callTool({
      name: "script.run",
      arguments: {
        source:
          "app.addStroke({ x: [0, 10], y: [0, 10], pressure: [1, 1] }); app.scrollToPos(5, 5); app.getDocumentStructure().pages[0].isAnnotated"
      }
    });

    expect(ran.isError).toBeFalsy();
    expect(ran.structuredContent).toEqual({
      ok: true,
      data: { result: true, events: [{ type: "scrolled", x: 5, y: 5 }], dialogs: [] }
    });
  });

  it("reports script failures as tool errors", async () => {
    const failed = await client.callTool({ name: "script.run", arguments: { source: "app.setCurrentLayer(5)" } });

    expect(failed.isError).toBe(true);
    expect(failed.content).toEqual([{ type: "text", text: "VALIDATION: No layer with layer ID 5" }]);
    expect(failed.structuredContent).toEqual({
      ok: false,
      error: {
        code: "VALIDATION",
        message: "No layer with layer ID 5",
        details: { layerId: 5, layerCount: 1, entryPoint: "setCurrentLayer" }
      }
    });

    const untargeted = await client.callTool({ name: "plugins.invoke", arguments: {} });
    expect(untargeted.isError).toBe(true);
    expect(untargeted.content).toEqual([
      { type: "text", text: "VALIDATION: Either menuId or plugin and callback are required" }
    ]);
  });

  it("serves the catalogue and the document structure", async () => {
    const catalogue = await readJson(CATALOGUE_URI);
    expect(catalogue).toMatchObject({ count: 27 });

    const reset = await client.callTool({ name: "document.reset", arguments: { seed: { pages: [{}, {}] } } });
    expect(reset.structuredContent).toEqual({
      ok: true,
      data: { pages: 2, plugins: { loaded: ["Hello"], disabled: [], errors: [] } }
    });

    const structure = await readJson(DOCUMENT_STRUCTURE_URI);
    expect(structure).toMatchObject({ currentPage: 1, pdfBackgroundFilename: "" });
    expect(services.bridge.documentStructure().pages).toHaveLength(2);
  });
});
