import type { HostControl } from "../host/types.js";
import type { Logger } from "../utils/logger.js";
import { AppError, StateError, ValidationError } from "../utils/errors.js";
import type { WarningSink } from "./coercion.js";

export interface MenuRegistration {
  menuId: number;
  menu: string;
  callback: string;
  accelerator: string;
}

/** Allocates the host-side handle of a menu entry. */
export type MenuRegistrar = (registration: Omit<MenuRegistration, "menuId">) => number;

export interface PluginContextOptions {
  name: string;
  control: HostControl;
  logger: Logger;
  registerMenu: MenuRegistrar;
}

/**
 * Binding of one loaded plugin to the editor. The plugin manager owns it;
 * entry points borrow it for the duration of a single call.
 */
export class PluginContext {
  readonly name: string;
  readonly control: HostControl;
  readonly logger: Logger;
  private readonly registrar: MenuRegistrar;
  private readonly menus: MenuRegistration[] = [];
  private uiInitPhase = false;

  constructor(options: PluginContextOptions) {
    this.name = options.name;
    this.control = options.control;
    this.logger = options.logger;
    this.registrar = options.registerMenu;
  }

  get inUiInit(): boolean {
    return this.uiInitPhase;
  }

  get menuRegistrations(): readonly MenuRegistration[] {
    return this.menus;
  }

  /** Runs `init` with UI registration open; the phase always closes afterwards. */
  runUiInit<T>(init: () => T): T {
    this.uiInitPhase = true;
    try {
      return init();
    } finally {
      this.uiInitPhase = false;
    }
  }

  registerMenu(menu: string, callback: string, accelerator: string): MenuRegistration {
    if (!this.uiInitPhase) {
      throw new ValidationError("registerUi needs to be called within initUi()", { plugin: this.name });
    }

    const menuId = this.registrar({ menu, callback, accelerator });
    const registration = { menuId, menu, callback, accelerator };
    this.menus.push(registration);
    return registration;
  }

  warn(warning: AppError): void {
    this.logger.warn(`${warning.code}: ${warning.message}`);
  }

  readonly warnSink: WarningSink = (warning) => this.warn(warning);
}

/**
 * Maps interpreter instances to their plugin context. Bound entry points keep
 * only the interpreter id and look the context up on every call.
 */
export class ContextRegistry {
  private readonly contexts = new Map<string, PluginContext>();

  bind(interpreterId: string, context: PluginContext): void {
    if (this.contexts.has(interpreterId)) {
      throw new AppError("CONFLICT", `Interpreter ${interpreterId} already has a plugin context`, {
        interpreterId
      });
    }
    this.contexts.set(interpreterId, context);
  }

  resolve(interpreterId: string): PluginContext {
    const context = this.contexts.get(interpreterId);
    if (!context) {
      throw new StateError("No plugin context is bound to this interpreter", { interpreterId });
    }
    return context;
  }

  release(interpreterId: string): boolean {
    return this.contexts.delete(interpreterId);
  }

  get size(): number {
    return this.contexts.size;
  }
}
