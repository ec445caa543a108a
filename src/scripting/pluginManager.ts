import { v4 as uuidv4 } from "uuid";
import { ContextRegistry, PluginContext, type MenuRegistration } from "../bridge/context.js";
import { bindAppLibrary } from "../bridge/registry.js";
import type { HostControl } from "../host/types.js";
import { AppError, asAppError } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { PluginLoader, type PluginDescriptor, type PluginLoadError } from "./pluginLoader.js";
import { ScriptSandbox } from "./scriptSandbox.js";

/** Name under which ad-hoc scripts run. */
export const CONSOLE_PLUGIN = "console";

interface LoadedPlugin {
  interpreterId: string;
  descriptor: PluginDescriptor;
  context: PluginContext;
  sandbox: ScriptSandbox;
}

interface MenuTarget {
  plugin: string;
  callback: string;
}

export interface PluginSummary {
  name: string;
  folder: string;
  description: string;
  author: string;
  version: string;
  menus: MenuRegistration[];
}

export interface LoadReport {
  loaded: string[];
  disabled: string[];
  errors: PluginLoadError[];
}

export interface PluginManagerOptions {
  pluginDir: string;
  control: HostControl;
  logger: Logger;
}

export class PluginManager {
  private readonly loader: PluginLoader;
  private readonly control: HostControl;
  private readonly logger: Logger;
  private readonly registry = new ContextRegistry();
  private readonly plugins = new Map<string, LoadedPlugin>();
  private readonly menus = new Map<number, MenuTarget>();
  private nextMenuId = 1;

  constructor(options: PluginManagerOptions) {
    this.loader = new PluginLoader(options.pluginDir, options.logger.child("loader"));
    this.control = options.control;
    this.logger = options.logger;
  }

  get activeInterpreters(): number {
    return this.registry.size;
  }

  async loadAll(): Promise<LoadReport> {
    const discovery = await this.loader.discover();
    const report: LoadReport = { loaded: [], disabled: discovery.disabled, errors: [...discovery.errors] };

    for (const descriptor of discovery.plugins) {
      try {
        const source = await this.loader.readSource(descriptor);
        this.start(descriptor, source);
        report.loaded.push(descriptor.name);
      } catch (error) {
        const message = asAppError(error).message;
        this.logger.error(`Plugin ${descriptor.name} failed to start: ${message}`);
        report.errors.push({ folder: descriptor.folder, message });
      }
    }

    this.logger.info(`Loaded ${report.loaded.length} plugin(s) from ${this.loader.rootPath}`);
    return report;
  }

  async reload(): Promise<LoadReport> {
    this.unloadAll();
    return this.loadAll();
  }

  unloadAll(): void {
    for (const plugin of this.plugins.values()) {
      this.registry.release(plugin.interpreterId);
    }
    this.plugins.clear();
    this.menus.clear();
  }

  list(): PluginSummary[] {
    return [...this.plugins.values()].map(({ descriptor, context }) => ({
      name: descriptor.name,
      folder: descriptor.folder,
      description: descriptor.manifest.description,
      author: descriptor.manifest.author,
      version: descriptor.manifest.version,
      menus: [...context.menuRegistrations]
    }));
  }

  invokeMenu(menuId: number): unknown {
    const target = this.menus.get(menuId);
    if (!target) {
      throw new AppError("NOT_FOUND", `No menu entry with id ${menuId}`, { menuId });
    }
    return this.runCallback(target.plugin, target.callback);
  }

  runCallback(pluginName: string, callback: string): unknown {
    const plugin = this.plugins.get(pluginName);
    if (!plugin) {
      throw new AppError("NOT_FOUND", `Plugin not loaded: ${pluginName}`, { plugin: pluginName });
    }
    if (!plugin.sandbox.hasFunction(callback)) {
      throw new AppError("NOT_FOUND", `Callback ${callback} not found in plugin ${pluginName}`, {
        plugin: pluginName,
        callback
      });
    }

    plugin.context.logger.debug(`Running callback ${callback}`);
    try {
      return plugin.sandbox.call(callback);
    } catch (error) {
      throw asAppError(error);
    }
  }

  /** Runs `source` in a throwaway interpreter bound to the same editor. */
  evaluate(source: string): unknown {
    const interpreterId = uuidv4();
    const context = this.createContext(CONSOLE_PLUGIN);
    this.registry.bind(interpreterId, context);
    try {
      const sandbox = this.createSandbox(interpreterId, context);
      return sandbox.run(source, `${CONSOLE_PLUGIN}.js`);
    } catch (error) {
      throw asAppError(error);
    } finally {
      this.registry.release(interpreterId);
    }
  }

  private start(descriptor: PluginDescriptor, source: string): void {
    if (this.plugins.has(descriptor.name)) {
      throw new AppError("CONFLICT", `Plugin ${descriptor.name} is already loaded`, { plugin: descriptor.name });
    }

    const interpreterId = uuidv4();
    const context = this.createContext(descriptor.name);
    this.registry.bind(interpreterId, context);

    try {
      const sandbox = this.createSandbox(interpreterId, context);
      sandbox.run(source, descriptor.mainPath);
      if (sandbox.hasFunction("initUi")) {
        context.runUiInit(() => sandbox.call("initUi"));
      } else {
        context.logger.debug("No initUi() function, no menu entries registered");
      }
      this.plugins.set(descriptor.name, { interpreterId, descriptor, context, sandbox });
    } catch (error) {
      this.registry.release(interpreterId);
      this.dropMenus(descriptor.name);
      throw error;
    }
  }

  private createContext(name: string): PluginContext {
    return new PluginContext({
      name,
      control: this.control,
      logger: this.logger.child(`plugin:${name}`),
      registerMenu: (registration) => {
        const menuId = this.nextMenuId;
        this.nextMenuId += 1;
        this.menus.set(menuId, { plugin: name, callback: registration.callback });
        return menuId;
      }
    });
  }

  private createSandbox(interpreterId: string, context: PluginContext): ScriptSandbox {
    return new ScriptSandbox({
      app: bindAppLibrary(this.registry, interpreterId),
      print: (line) => context.logger.info(line)
    });
  }

  private dropMenus(pluginName: string): void {
    for (const [menuId, target] of this.menus) {
      if (target.plugin === pluginName) {
        this.menus.delete(menuId);
      }
    }
  }
}
