import { readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { pluginManifestSchema, type PluginManifest } from "../types/contracts.js";
import { asAppError } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { ensureInsideRoot, sanitizePluginFolder } from "../utils/pathSafety.js";

export const MANIFEST_FILE = "plugin.json";

export interface PluginDescriptor {
  /** Manifest name, or the folder name when the manifest has none. */
  name: string;
  folder: string;
  directory: string;
  mainPath: string;
  manifest: PluginManifest;
}

export interface PluginLoadError {
  folder: string;
  message: string;
}

export interface DiscoveryResult {
  plugins: PluginDescriptor[];
  disabled: string[];
  errors: PluginLoadError[];
}

export class PluginLoader {
  private readonly root: string;
  private readonly logger: Logger;

  constructor(root: string, logger: Logger) {
    this.root = root;
    this.logger = logger;
  }

  get rootPath(): string {
    return this.root;
  }

  async discover(): Promise<DiscoveryResult> {
    const result: DiscoveryResult = { plugins: [], disabled: [], errors: [] };
    const rootStats = await stat(this.root).catch(() => null);
    if (!rootStats?.isDirectory()) {
      this.logger.debug(`Plugin folder ${this.root} does not exist`);
      return result;
    }

    const entries = await readdir(this.root, { withFileTypes: true });
    const folders = entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b));

    const seen = new Set<string>();
    for (const folder of folders) {
      try {
        const descriptor = await this.describe(folder);
        if (!descriptor) {
          continue;
        }
        if (!descriptor.manifest.enabled) {
          result.disabled.push(descriptor.name);
          continue;
        }
        if (seen.has(descriptor.name)) {
          throw new Error(`Duplicate plugin name ${descriptor.name}`);
        }
        seen.add(descriptor.name);
        result.plugins.push(descriptor);
      } catch (error) {
        const message = asAppError(error).message;
        this.logger.warn(`Could not load plugin ${folder}: ${message}`);
        result.errors.push({ folder, message });
      }
    }

    return result;
  }

  /** Undefined for folders without a manifest; those are not plugins. */
  private async describe(folder: string): Promise<PluginDescriptor | undefined> {
    const directory = ensureInsideRoot(this.root, join(this.root, sanitizePluginFolder(folder)));
    const manifestPath = join(directory, MANIFEST_FILE);
    const raw = await readFile(manifestPath, "utf8").catch(() => null);
    if (raw === null) {
      this.logger.debug(`Skipping ${folder}: no ${MANIFEST_FILE}`);
      return undefined;
    }

    const parsed = pluginManifestSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "manifest"}: ${issue.message}`);
      throw new Error(`Invalid ${MANIFEST_FILE}: ${issues.join("; ")}`);
    }

    const manifest = parsed.data;
    return {
      name: manifest.name ?? folder,
      folder,
      directory,
      mainPath: ensureInsideRoot(directory, join(directory, manifest.mainfile)),
      manifest
    };
  }

  async readSource(plugin: PluginDescriptor): Promise<string> {
    return readFile(plugin.mainPath, "utf8");
  }
}
