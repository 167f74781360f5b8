import { QueueError } from "../queue/errors.js";
import type { TextModule } from "./types.js";
import { tokensModule } from "./tokens.js";
import { upperModule } from "./upper.js";

/**
 * Read-only name -> module mapping, built once at startup and handed to the
 * components that need it.
 */
export class ModuleRegistry {
  private readonly modules: ReadonlyMap<string, TextModule>;

  constructor(modules: readonly TextModule[]) {
    const map = new Map<string, TextModule>();
    for (const m of modules) {
      if (map.has(m.name)) throw new Error(`Module already registered: ${m.name}`);
      map.set(m.name, m);
    }
    this.modules = map;
  }

  get(name: string): TextModule | undefined {
    return this.modules.get(name);
  }

  has(name: string): boolean {
    return this.modules.has(name);
  }

  require(name: string): TextModule {
    const m = this.modules.get(name);
    if (!m) throw new QueueError("UnknownModule", `Unknown module: ${name}`);
    return m;
  }

  names(): string[] {
    return [...this.modules.keys()].sort();
  }

  /**
   * Converts a stored result through the module's `convert`.
   */
  convert(name: string, result: string, format: string, id: string): string {
    const m = this.require(name);
    if (!m.convert) {
      throw new QueueError("InvalidArgument", `Module ${name} does not convert results (format=${format})`);
    }
    return m.convert(result, format, id);
  }
}

export function createModuleRegistry(modules: readonly TextModule[]): ModuleRegistry {
  return new ModuleRegistry(modules);
}

export const BUILTIN_MODULES: readonly TextModule[] = [upperModule, tokensModule];

export function createDefaultRegistry(): ModuleRegistry {
  return createModuleRegistry(BUILTIN_MODULES);
}
