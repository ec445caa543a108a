import { join } from "node:path";
import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./utils/logger.js";

export interface BridgeConfig {
  /** Root that plugin and document paths are resolved against */
  workspaceRoot: string;
  /** Directory holding one folder per plugin */
  pluginDir: string;
  /** Optional JSON document seed loaded at startup */
  documentPath?: string;
  logLevel: LogLevel;
  displayDpi: number;
}

const configSchema = z.object({
  workspaceRoot: z.string().min(1),
  pluginDir: z.string().min(1).optional(),
  documentPath: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  displayDpi: z.coerce.number().int().min(1).max(1200).default(72)
});

export function parseArg(argv: readonly string[], flag: string): string | undefined {
  const index = argv.findIndex((value) => value === flag);
  if (index === -1) {
    return undefined;
  }

  return argv[index + 1];
}

export function loadConfig(
  argv: readonly string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): BridgeConfig {
  const parsed = configSchema.safeParse({
    workspaceRoot: parseArg(argv, "--workspace") ?? env.MCP_WORKSPACE_ROOT ?? cwd,
    pluginDir: parseArg(argv, "--plugins") ?? env.INKSCRIPT_PLUGIN_DIR,
    documentPath: parseArg(argv, "--document") ?? env.INKSCRIPT_DOCUMENT,
    logLevel: parseArg(argv, "--log-level") ?? env.INKSCRIPT_LOG_LEVEL,
    displayDpi: parseArg(argv, "--dpi") ?? env.INKSCRIPT_DISPLAY_DPI
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }

  const { workspaceRoot, pluginDir, documentPath, logLevel, displayDpi } = parsed.data;
  return {
    workspaceRoot,
    pluginDir: pluginDir ?? join(workspaceRoot, "plugins"),
    documentPath,
    logLevel,
    displayDpi
  };
}
