import vm from "node:vm";
import { format } from "node:util";
import type { AppLibrary } from "../bridge/registry.js";
import { AppError } from "../utils/errors.js";

export interface ScriptSandboxOptions {
  app: AppLibrary;
  print: (line: string) => void;
}

/**
 * One interpreter: a context of its own holding `app` and `print`. Functions
 * a script declares at top level stay reachable as callbacks.
 */
export class ScriptSandbox {
  private readonly context: vm.Context;

  constructor(options: ScriptSandboxOptions) {
    const sandbox: Record<string, unknown> = Object.create(null);
    Object.defineProperty(sandbox, "app", {
      configurable: false,
      enumerable: true,
      writable: false,
      value: options.app
    });
    Object.defineProperty(sandbox, "print", {
      configurable: false,
      enumerable: true,
      writable: false,
      value: (...values: unknown[]) => options.print(format(...values))
    });

    this.context = vm.createContext(sandbox, {
      codeGeneration: {
        strings: false,
        wasm: false
      }
    });
  }

  run(source: string, filename: string): unknown {
    const script = new vm.Script(source, { filename });
    return script.runInContext(this.context);
  }

  hasFunction(name: string): boolean {
    const candidate: unknown = this.context[name];
    return typeof candidate === "function";
  }

  call(name: string, ...args: unknown[]): unknown {
    const candidate: unknown = this.context[name];
    if (typeof candidate !== "function") {
      throw new AppError("NOT_FOUND", `Function ${name} is not defined`, { callback: name });
    }
    return Reflect.apply(candidate, undefined, args);
  }
}
