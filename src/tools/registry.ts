import { schemaToJSONSchema, validateToolSchema } from "./schema-to-json.js";
import type { BaseTool } from "./tool.js";

// Type for tool constructor
export type ToolClass = new (...args: unknown[]) => BaseTool;

// Type for tool or tool class
export type ToolOrClass = BaseTool | ToolClass;

/**
 * What the backend is told about a tool.
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  /** JSON Schema of the arguments object */
  inputSchema: Record<string, unknown>;
  timeoutMs?: number;
}

const EMPTY_OBJECT_SCHEMA: Record<string, unknown> = { type: "object", properties: {} };

interface Entry {
  name: string;
  tool: BaseTool;
  descriptor: ToolDescriptor;
}

/**
 * Name-indexed set of tools. Lookups are case-insensitive; descriptors keep
 * the name as registered.
 *
 * Once sealed (the agent seals the registry it is given) the registry is
 * read-only, which is what makes sharing it between concurrent dispatches safe.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, Entry>();
  private sealed = false;

  /**
   * Creates a registry from an array of tool classes or instances,
   * or an object mapping names to tools.
   *
   * @example
   * ```typescript
   * const registry = ToolRegistry.from([ReadFile, new Shell({ cwd: "/srv" })]);
   *
   * const aliased = ToolRegistry.from({ read: ReadFile, sh: new Shell({ cwd: "/srv" }) });
   * ```
   */
  static from(tools: ToolOrClass[] | Record<string, ToolOrClass>): ToolRegistry {
    const registry = new ToolRegistry();

    if (Array.isArray(tools)) {
      registry.registerMany(tools);
    } else {
      for (const [name, tool] of Object.entries(tools)) {
        const instance = typeof tool === "function" ? new tool() : tool;
        registry.register(name, instance);
      }
    }

    return registry;
  }

  registerMany(tools: ToolOrClass[]): this {
    for (const tool of tools) {
      const instance = typeof tool === "function" ? new tool() : tool;
      this.registerByClass(instance);
    }
    return this;
  }

  // Register a tool under an explicit name
  register(name: string, tool: BaseTool): void {
    this.assertWritable();

    const normalizedName = name.toLowerCase();
    if (this.tools.has(normalizedName)) {
      throw new Error(`Tool '${name}' is already registered`);
    }

    if (tool.parameterSchema) {
      validateToolSchema(tool.parameterSchema, name);
    }

    const descriptor: ToolDescriptor = Object.freeze({
      name,
      description: tool.description,
      inputSchema: tool.parameterSchema ? schemaToJSONSchema(tool.parameterSchema) : EMPTY_OBJECT_SCHEMA,
      ...(tool.timeoutMs !== undefined ? { timeoutMs: tool.timeoutMs } : {}),
    });

    this.tools.set(normalizedName, { name, tool, descriptor });
  }

  // Register a tool using its name property or class name
  registerByClass(tool: BaseTool): void {
    this.register(tool.getName(), tool);
  }

  // Get tool by name (case-insensitive)
  get(name: string): BaseTool | undefined {
    return this.tools.get(name.toLowerCase())?.tool;
  }

  has(name: string): boolean {
    return this.tools.has(name.toLowerCase());
  }

  // Registered names, as registered
  getNames(): string[] {
    return Array.from(this.tools.values(), (entry) => entry.name);
  }

  getDescriptors(): ToolDescriptor[] {
    return Array.from(this.tools.values(), (entry) => entry.descriptor);
  }

  unregister(name: string): boolean {
    this.assertWritable();
    return this.tools.delete(name.toLowerCase());
  }

  clear(): void {
    this.assertWritable();
    this.tools.clear();
  }

  /**
   * Make the registry read-only. Idempotent.
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.tools.size;
  }

  private assertWritable(): void {
    if (this.sealed) {
      throw new Error("Tool registry is sealed and can no longer be modified");
    }
  }
}
