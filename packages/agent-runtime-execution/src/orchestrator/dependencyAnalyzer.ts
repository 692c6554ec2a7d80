/**
 * Dependency Analyzer
 *
 * Groups one turn's tool calls into waves that can run concurrently.
 *
 * Edges come from:
 * - `dependsOn` ids declared by the model
 * - exclusive tools, which wait for every earlier call and block every later one
 * - serial mode, which chains each call to the one before it
 *
 * Calls caught in a cycle (and anything waiting on them) land in a final group.
 */

import type { ToolCall, ToolConcurrency } from "@warden/agent-runtime-core";

// ============================================================================
// Types
// ============================================================================

interface DependencyNode {
  call: ToolCall;
  index: number;
  /** Every ordering edge (declared or implied) */
  dependencies: Set<number>;
  dependents: Set<number>;
  /** Edges the model declared through `dependsOn` */
  declared: Set<number>;
  group: number;
}

export interface DependencyAnalysis {
  /** Execution groups (each group can run in parallel) */
  groups: ToolCall[][];
  /** Declared prerequisites per call id, in call order */
  prerequisites: Map<string, string[]>;
  /** Detected cycles, as call ids */
  cycles: string[][];
}

export type ToolConcurrencyResolver = (toolName: string) => ToolConcurrency | undefined;

export interface DependencyAnalysisOptions {
  resolveConcurrency?: ToolConcurrencyResolver;
  /** Run every call one after another */
  serial?: boolean;
}

// ============================================================================
// Dependency Analyzer
// ============================================================================

export class DependencyAnalyzer {
  constructor(private readonly resolveConcurrency?: ToolConcurrencyResolver) {}

  analyze(calls: ToolCall[], options: DependencyAnalysisOptions = {}): DependencyAnalysis {
    if (calls.length === 0) {
      return { groups: [], prerequisites: new Map(), cycles: [] };
    }

    const resolveConcurrency = options.resolveConcurrency ?? this.resolveConcurrency;
    const graph = this.initializeNodes(calls);
    this.resolveDeclaredDependencies(graph);
    if (options.serial) {
      this.chainSerially(graph);
    } else {
      this.resolveExclusiveDependencies(graph, resolveConcurrency);
    }

    const cycles = this.detectCycles(graph).map((cycle) =>
      cycle.map((index) => graph.get(index)?.call.id ?? String(index))
    );
    const groups = this.topologicalGroup(graph);

    const prerequisites = new Map<string, string[]>();
    for (const node of graph.values()) {
      const ids = [...node.declared]
        .sort((a, b) => a - b)
        .map((index) => graph.get(index)?.call.id)
        .filter((id): id is string => id !== undefined);
      prerequisites.set(node.call.id, ids);
    }

    return { groups, prerequisites, cycles };
  }

  private initializeNodes(calls: ToolCall[]): Map<number, DependencyNode> {
    const graph = new Map<number, DependencyNode>();
    calls.forEach((call, index) => {
      graph.set(index, {
        call,
        index,
        dependencies: new Set(),
        dependents: new Set(),
        declared: new Set(),
        group: -1,
      });
    });
    return graph;
  }

  private addEdge(graph: Map<number, DependencyNode>, from: number, to: number): void {
    if (from === to) {
      return;
    }
    graph.get(to)?.dependencies.add(from);
    graph.get(from)?.dependents.add(to);
  }

  private resolveDeclaredDependencies(graph: Map<number, DependencyNode>): void {
    const indexById = new Map<string, number>();
    for (const [index, node] of graph) {
      if (!indexById.has(node.call.id)) {
        indexById.set(node.call.id, index);
      }
    }

    for (const [index, node] of graph) {
      for (const id of node.call.dependsOn ?? []) {
        const dependency = indexById.get(id);
        // Unknown ids and self references carry no ordering
        if (dependency === undefined || dependency === index) {
          continue;
        }
        node.declared.add(dependency);
        this.addEdge(graph, dependency, index);
      }
    }
  }

  private resolveExclusiveDependencies(
    graph: Map<number, DependencyNode>,
    resolveConcurrency?: ToolConcurrencyResolver
  ): void {
    let lastExclusiveIndex: number | undefined;

    for (const [index, node] of graph) {
      if (lastExclusiveIndex !== undefined) {
        this.addEdge(graph, lastExclusiveIndex, index);
      }

      if (resolveConcurrency?.(node.call.name) === "exclusive") {
        for (let earlier = 0; earlier < index; earlier++) {
          this.addEdge(graph, earlier, index);
        }
        lastExclusiveIndex = index;
      }
    }
  }

  private chainSerially(graph: Map<number, DependencyNode>): void {
    for (const index of graph.keys()) {
      if (index > 0) {
        this.addEdge(graph, index - 1, index);
      }
    }
  }

  private detectCycles(graph: Map<number, DependencyNode>): number[][] {
    const cycles: number[][] = [];
    const visited = new Set<number>();
    const recStack = new Set<number>();

    const dfs = (nodeIndex: number, path: number[]): void => {
      if (recStack.has(nodeIndex)) {
        const cycleStart = path.indexOf(nodeIndex);
        cycles.push(path.slice(cycleStart));
        return;
      }

      if (visited.has(nodeIndex)) {
        return;
      }

      visited.add(nodeIndex);
      recStack.add(nodeIndex);

      const node = graph.get(nodeIndex);
      if (node) {
        for (const dep of node.dependencies) {
          dfs(dep, [...path, nodeIndex]);
        }
      }

      recStack.delete(nodeIndex);
    };

    for (const index of graph.keys()) {
      if (!visited.has(index)) {
        dfs(index, []);
      }
    }

    return cycles;
  }

  /**
   * Kahn's algorithm, one group per level.
   */
  private topologicalGroup(graph: Map<number, DependencyNode>): ToolCall[][] {
    const groups: ToolCall[][] = [];
    const inDegree = new Map<number, number>();
    const queue: number[] = [];

    for (const [index, node] of graph) {
      inDegree.set(index, node.dependencies.size);
      if (node.dependencies.size === 0) {
        queue.push(index);
      }
    }

    while (queue.length > 0) {
      const currentGroup = this.processLevel(queue, graph, inDegree, groups.length);
      if (currentGroup.length > 0) {
        groups.push(currentGroup);
      }
    }

    const remaining = [...graph.values()].filter((node) => node.group === -1);
    if (remaining.length > 0) {
      for (const node of remaining) {
        node.group = groups.length;
      }
      groups.push(remaining.map((node) => node.call));
    }

    return groups;
  }

  private processLevel(
    queue: number[],
    graph: Map<number, DependencyNode>,
    inDegree: Map<number, number>,
    groupId: number
  ): ToolCall[] {
    const currentGroup: ToolCall[] = [];
    const currentLevelSize = queue.length;

    for (let i = 0; i < currentLevelSize; i++) {
      const index = queue.shift();
      if (index === undefined) {
        continue;
      }

      const node = graph.get(index);
      if (!node) {
        continue;
      }

      currentGroup.push(node.call);
      node.group = groupId;

      for (const dependent of node.dependents) {
        const depInDegree = (inDegree.get(dependent) ?? 0) - 1;
        inDegree.set(dependent, depInDegree);

        if (depInDegree === 0) {
          queue.push(dependent);
        }
      }
    }
    return currentGroup;
  }
}

export function createDependencyAnalyzer(
  options: Pick<DependencyAnalysisOptions, "resolveConcurrency"> = {}
): DependencyAnalyzer {
  return new DependencyAnalyzer(options.resolveConcurrency);
}
