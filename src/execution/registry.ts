import { ValidationError } from "../errors.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("tool-registry");

/** Variables threaded through a workflow run. Each step sees a frozen snapshot. */
export type ExecutionContext = Readonly<Record<string, unknown>>;

/** Keys a tool adds or overwrites in the context. */
export type ToolOutput = Record<string, unknown>;

/** A host-supplied tool implementation. */
export interface Invocable {
  readonly name: string;
  call(context: ExecutionContext): ToolOutput | Promise<ToolOutput>;
}

/** Looks up an Invocable by a Tool's callable reference. */
export interface ToolResolver {
  resolve(callable: string): Invocable | undefined;
}

/** Build an Invocable from a plain function. */
export function defineTool(
  name: string,
  call: (context: ExecutionContext) => ToolOutput | Promise<ToolOutput>,
): Invocable {
  return { name, call };
}

export class ToolRegistry implements ToolResolver {
  private tools = new Map<string, Invocable>();

  constructor(initial: Invocable[] = []) {
    for (const tool of initial) this.register(tool);
  }

  /** Register a tool under its name. Re-registering a name replaces the old entry. */
  register(tool: Invocable): void {
    if (tool.name.trim().length === 0) {
      throw new ValidationError("Tool name must not be empty", "name");
    }
    if (this.tools.has(tool.name)) {
      log.warn({ name: tool.name }, "replacing registered tool");
    }
    this.tools.set(tool.name, tool);
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  resolve(callable: string): Invocable | undefined {
    return this.tools.get(callable);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): string[] {
    return [...this.tools.keys()].sort();
  }
}
