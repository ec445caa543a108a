import { buildDocumentStructure, type DocumentStructureView } from "../bridge/functions/document.js";
import { createMemoryHost, type DialogRecord, type HostEvent, type MemoryControl } from "../host/memory/index.js";
import { PluginManager, type LoadReport, type PluginSummary } from "../scripting/pluginManager.js";
import { dialogResponsesSchema, type DialogResponsesInput, type DocumentSeedInput } from "../types/contracts.js";
import { AppError } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";

export interface BridgeServiceOptions {
  pluginDir: string;
  logger: Logger;
  displayDpi?: number;
  seed?: DocumentSeedInput;
}

export interface InvokeTarget {
  menuId?: number;
  plugin?: string;
  callback?: string;
}

export interface InvocationResult {
  /** Return value of the script, as JSON. */
  result: unknown;
  events: HostEvent[];
  dialogs: DialogRecord[];
}

function toJsonValue(value: unknown): unknown {
  const text = JSON.stringify(value);
  return text === undefined ? null : JSON.parse(text);
}

/**
 * The editor and its plugins as one unit. Resetting the document starts
 * both over, since plugin contexts hold on to the editor they were bound to.
 */
export class BridgeService {
  private readonly options: BridgeServiceOptions;
  private control: MemoryControl;
  private plugins: PluginManager;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: BridgeServiceOptions) {
    this.options = options;
    this.control = this.createHost(options.seed);
    this.plugins = this.createPluginManager();
  }

  get host(): MemoryControl {
    return this.control;
  }

  async start(): Promise<LoadReport> {
    return this.serialized(() => this.plugins.loadAll());
  }

  listPlugins(): PluginSummary[] {
    return this.plugins.list();
  }

  async reloadPlugins(): Promise<LoadReport> {
    return this.serialized(() => this.plugins.reload());
  }

  async invoke(target: InvokeTarget, dialogResponses?: DialogResponsesInput): Promise<InvocationResult> {
    return this.observe(dialogResponses, () => {
      if (target.menuId !== undefined) {
        return this.plugins.invokeMenu(target.menuId);
      }
      if (target.plugin !== undefined && target.callback !== undefined) {
        return this.plugins.runCallback(target.plugin, target.callback);
      }
      throw new AppError("VALIDATION", "Either menuId or plugin and callback are required");
    });
  }

  async runScript(source: string, dialogResponses?: DialogResponsesInput): Promise<InvocationResult> {
    return this.observe(dialogResponses, () => this.plugins.evaluate(source));
  }

  documentStructure(): DocumentStructureView {
    return buildDocumentStructure(this.control);
  }

  async resetDocument(seed?: DocumentSeedInput): Promise<LoadReport> {
    return this.serialized(() => {
      this.plugins.unloadAll();
      this.control = this.createHost(seed);
      this.plugins = this.createPluginManager();
      return this.plugins.loadAll();
    });
  }

  close(): void {
    this.plugins.unloadAll();
  }

  /** Plugin lifecycle changes and script runs never overlap. */
  private async serialized<T>(fn: () => T | Promise<T>): Promise<T> {
    const previous = this.queue;
    let release: (() => void) | undefined;
    this.queue = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      return await fn();
    } finally {
      release?.();
    }
  }

  private async observe(
    dialogResponses: DialogResponsesInput | undefined,
    run: () => unknown
  ): Promise<InvocationResult> {
    return this.serialized(() => this.collect(dialogResponses, run));
  }

  /** Each run reports only its own events and dialogs; the host logs are emptied afterwards. */
  private collect(dialogResponses: DialogResponsesInput | undefined, run: () => unknown): InvocationResult {
    const dialogs = this.control.getDialogs();

    this.control.drainEvents();
    dialogs.clear();
    dialogs.enqueue(dialogResponsesSchema.parse(dialogResponses ?? {}));
    try {
      const result = toJsonValue(run());
      return {
        result,
        events: this.control.drainEvents(),
        dialogs: dialogs.drainShown()
      };
    } finally {
      this.control.drainEvents();
      dialogs.clear();
    }
  }

  private createHost(seed: DocumentSeedInput | undefined): MemoryControl {
    return createMemoryHost(seed, { displayDpi: this.options.displayDpi });
  }

  private createPluginManager(): PluginManager {
    return new PluginManager({
      pluginDir: this.options.pluginDir,
      control: this.control,
      logger: this.options.logger
    });
  }
}
