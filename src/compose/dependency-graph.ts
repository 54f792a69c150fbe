/**
 * Static analysis of `depends_on`.
 *
 * Nothing here starts or waits for anything: the graph only describes the order the
 * orchestrator is bound to honor, and catches references it would reject.
 */

import { Failure, Success, type Result } from '../domain/types/result.js';
import type { ComposeProject } from '../domain/types/compose.js';

export interface DependencyGraph {
  /** Service names in declaration order */
  nodes: string[];
  /** Edges to known services only, in declaration order */
  edges: Map<string, string[]>;
  unknown: Array<{ service: string; dependency: string }>;
}

export function buildDependencyGraph(project: ComposeProject): DependencyGraph {
  const nodes = project.services.map((service) => service.name);
  const known = new Set(nodes);
  const edges = new Map<string, string[]>();
  const unknown: DependencyGraph['unknown'] = [];

  for (const service of project.services) {
    const targets: string[] = [];
    for (const dependency of service.dependsOn) {
      if (known.has(dependency.service)) targets.push(dependency.service);
      else unknown.push({ service: service.name, dependency: dependency.service });
    }
    edges.set(service.name, targets);
  }

  return { nodes, edges, unknown };
}

/**
 * Every distinct cycle, each listed from the first service reached on it.
 * A self-dependency is a one-element cycle.
 */
export function findCycles(graph: DependencyGraph): string[][] {
  const state = new Map<string, 'visiting' | 'done'>();
  const stack: string[] = [];
  const cycles: string[][] = [];
  const seen = new Set<string>();

  const visit = (node: string): void => {
    state.set(node, 'visiting');
    stack.push(node);

    for (const next of graph.edges.get(node) ?? []) {
      const status = state.get(next);
      if (status === 'visiting') {
        const cycle = stack.slice(stack.indexOf(next));
        const key = [...cycle].sort().join('\u0000');
        if (!seen.has(key)) {
          seen.add(key);
          cycles.push(cycle);
        }
      } else if (status === undefined) {
        visit(next);
      }
    }

    stack.pop();
    state.set(node, 'done');
  };

  for (const node of graph.nodes) {
    if (!state.has(node)) visit(node);
  }

  return cycles;
}

export function formatCycle(cycle: string[]): string {
  return [...cycle, cycle[0]].join(' -> ');
}

/**
 * Group services into tiers; each tier depends only on earlier ones
 */
export function startupTiers(project: ComposeProject): Result<string[][]> {
  const graph = buildDependencyGraph(project);
  const placed = new Set<string>();
  const remaining = [...graph.nodes];
  const tiers: string[][] = [];

  while (remaining.length > 0) {
    const tier = remaining.filter((node) => (graph.edges.get(node) ?? []).every((dep) => placed.has(dep)));

    if (tier.length === 0) {
      const [cycle] = findCycles(graph);
      return Failure(`Dependency cycle: ${cycle ? formatCycle(cycle) : remaining.join(', ')}`);
    }

    for (const node of tier) {
      placed.add(node);
      remaining.splice(remaining.indexOf(node), 1);
    }
    tiers.push(tier);
  }

  return Success(tiers);
}
