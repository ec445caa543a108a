#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { loadConfig } from "./config.js";
import { createBridgeMcpServer } from "./server/createServer.js";
import { startStdioTransport } from "./transports/stdio.js";
import { documentSeedSchema, type DocumentSeed } from "./types/contracts.js";
import { StderrLogger } from "./utils/logger.js";
import { ensureInsideRoot } from "./utils/pathSafety.js";

async function resolvePackageVersion(): Promise<string> {
  try {
    const raw = await readFile(new URL("../package.json", import.meta.url), "utf8");
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
    return "0.1.0";
  } catch {
    return "0.1.0";
  }
}

async function loadDocumentSeed(workspaceRoot: string, documentPath: string | undefined): Promise<DocumentSeed | undefined> {
  if (!documentPath) {
    return undefined;
  }

  const raw = await readFile(ensureInsideRoot(workspaceRoot, documentPath), "utf8");
  return documentSeedSchema.parse(JSON.parse(raw));
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new StderrLogger("inkscript", config.logLevel);
  const version = await resolvePackageVersion();

  const services = await createBridgeMcpServer({
    pluginDir: config.pluginDir,
    logger,
    version,
    displayDpi: config.displayDpi,
    seed: await loadDocumentSeed(config.workspaceRoot, config.documentPath)
  });

  await startStdioTransport(services.server);
  logger.info(`inkscript-bridge ${version} ready, plugins from ${config.pluginDir}`);

  const shutdown = async () => {
    services.bridge.close();
    await services.server.close();
    process.exit(0);
  };

  process.once("SIGINT", () => {
    void shutdown();
  });
  process.once("SIGTERM", () => {
    void shutdown();
  });
}

main().catch((error) => {
  process.stderr.write(`Failed to start inkscript-bridge: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
