/**
 * Tool Registry
 *
 * Name → capability map resolved at startup. Registering or removing a tool
 * notifies listeners so long-lived consumers can refresh incrementally.
 */

import type {
  SecurityTier,
  ToolCapability,
  ToolRegistry,
  ToolRegistryChange,
} from "@warden/agent-runtime-core";
import { getLogger } from "@warden/agent-runtime-telemetry/logging";
import type { ZodType, ZodTypeDef } from "zod";

const logger = getLogger("tool-registry");

type ChangeListener = (change: ToolRegistryChange) => void;

export class InMemoryToolRegistry implements ToolRegistry {
  private readonly tools = new Map<string, ToolCapability>();
  private readonly listeners = new Set<ChangeListener>();

  constructor(tools: ToolCapability[] = []) {
    for (const tool of tools) {
      this.tools.set(tool.name, tool);
    }
  }

  register<TArgs>(tool: ToolCapability<TArgs>): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, tool);
    this.notify({ type: "registered", name: tool.name });
  }

  unregister(name: string): boolean {
    const removed = this.tools.delete(name);
    if (removed) {
      this.notify({ type: "unregistered", name });
    }
    return removed;
  }

  get(name: string): ToolCapability | undefined {
    return this.tools.get(name);
  }

  list(): ToolCapability[] {
    return Array.from(this.tools.values());
  }

  declaredTier(name: string): SecurityTier | undefined {
    return this.tools.get(name)?.tier;
  }

  schema(name: string): ZodType<unknown, ZodTypeDef, unknown> | undefined {
    return this.tools.get(name)?.schema;
  }

  onChange(listener: ChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(change: ToolRegistryChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        logger.error("Tool registry listener failed", error);
      }
    }
  }
}

/**
 * Typed helper for declaring a tool; infers the argument type from the schema.
 */
export function defineTool<TArgs>(tool: ToolCapability<TArgs>): ToolCapability<TArgs> {
  return tool;
}
