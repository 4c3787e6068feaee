// packages/core/src/graph/builder.ts: Step registry to dependency graph

import { expandStep } from '../steps/parametrize.js';
import type { StepRegistry } from '../steps/registry.js';
import type { Graph, GraphNode, GroupNode } from '../types/graph.js';
import type { GroupSpec } from '../types/step.js';
import { CyclicGraphError, DuplicateStepError, UnknownStepError } from '../utils/errors.js';

function unique(keys: Iterable<string>): string[] {
  return [...new Set(keys)];
}

/**
 * Expand every registered spec, synthesize group nodes, resolve requirements
 * and reject cycles. Freezes the registry.
 */
export function buildGraph(registry: StepRegistry): Graph {
  registry.freeze();

  const nodes = new Map<string, GraphNode>();
  const declarationOrder: string[] = [];

  const addNode = (node: GraphNode): void => {
    if (nodes.has(node.key)) {
      throw new DuplicateStepError(node.key);
    }
    nodes.set(node.key, node);
    declarationOrder.push(node.key);
  };

  for (const spec of registry.steps) {
    const variants = expandStep(spec);
    for (const variant of variants) addNode(variant);
    if (variants.length > 1) {
      addNode({
        kind: 'group',
        key: spec.name,
        name: spec.name,
        description: spec.description,
        members: variants.map((v) => v.key),
        runByDefault: variants.every((v) => v.runByDefault),
      });
    }
  }

  const explicitGroups = new Map<string, GroupSpec>(registry.groups.map((g) => [g.name, g]));
  const flattened = new Map<string, string[]>();

  // Resolve a name to step keys, following explicit groups through each other.
  const flatten = (name: string, trail: readonly string[]): string[] => {
    const cached = flattened.get(name);
    if (cached) return cached;

    const group = explicitGroups.get(name);
    if (!group) {
      const node = nodes.get(name);
      if (!node) throw new UnknownStepError([name], trail.at(-1));
      return node.kind === 'group' ? [...node.members] : [name];
    }

    if (trail.includes(name)) {
      throw new CyclicGraphError([...trail.slice(trail.indexOf(name)), name]);
    }
    const missing = group.requires.filter((req) => !nodes.has(req) && !explicitGroups.has(req));
    if (missing.length > 0) {
      throw new UnknownStepError(missing, name);
    }
    const members = unique(group.requires.flatMap((req) => flatten(req, [...trail, name])));
    flattened.set(name, members);
    return members;
  };

  for (const group of registry.groups) {
    addNode({
      kind: 'group',
      key: group.name,
      name: group.name,
      description: group.description,
      members: flatten(group.name, []),
      runByDefault: group.runByDefault ?? true,
    });
  }

  const requires = new Map<string, readonly string[]>();
  for (const key of declarationOrder) {
    const node = nodes.get(key);
    if (!node) continue;
    if (node.kind === 'group') {
      requires.set(key, node.members);
      continue;
    }
    const missing = node.requires.filter((req) => !nodes.has(req));
    if (missing.length > 0) {
      throw new UnknownStepError(unique(missing), node.key);
    }
    requires.set(key, unique(node.requires));
  }

  const cycle = findCycle(declarationOrder, requires);
  if (cycle) {
    throw new CyclicGraphError(cycle);
  }

  const dependents = new Map<string, string[]>(declarationOrder.map((k) => [k, []]));
  for (const key of declarationOrder) {
    for (const req of requires.get(key) ?? []) {
      dependents.get(req)?.push(key);
    }
  }

  return { nodes, requires, dependents, declarationOrder };
}

/** Depth-first search for a cycle. Returns its full path, first node repeated at the end. */
export function findCycle(
  keys: readonly string[],
  requires: ReadonlyMap<string, readonly string[]>,
): string[] | null {
  const done = new Set<string>();
  const path: string[] = [];
  const onPath = new Set<string>();

  const visit = (key: string): string[] | null => {
    if (onPath.has(key)) {
      return [...path.slice(path.indexOf(key)), key];
    }
    if (done.has(key)) return null;

    path.push(key);
    onPath.add(key);
    for (const next of requires.get(key) ?? []) {
      const cycle = visit(next);
      if (cycle) return cycle;
    }
    path.pop();
    onPath.delete(key);
    done.add(key);
    return null;
  };

  for (const key of keys) {
    const cycle = visit(key);
    if (cycle) return cycle;
  }
  return null;
}

export function getNode(graph: Graph, key: string): GraphNode {
  const node = graph.nodes.get(key);
  if (!node) throw new UnknownStepError([key]);
  return node;
}

export function isGroup(node: GraphNode): node is GroupNode {
  return node.kind === 'group';
}

/** The given keys plus everything they transitively require. */
export function requirementClosure(graph: Graph, keys: Iterable<string>): Set<string> {
  const closure = new Set<string>();
  const stack = [...keys];
  while (stack.length > 0) {
    const key = stack.pop();
    if (key === undefined || closure.has(key)) continue;
    closure.add(key);
    stack.push(...(graph.requires.get(key) ?? []));
  }
  return closure;
}

/**
 * Resolve user-given names to node keys. A group resolves to itself and its
 * members. Unknown names fail together.
 */
export function expandNames(graph: Graph, names: readonly string[]): string[] {
  const missing = names.filter((name) => !graph.nodes.has(name));
  if (missing.length > 0) {
    throw new UnknownStepError(unique(missing));
  }
  return unique(
    names.flatMap((name) => {
      const node = getNode(graph, name);
      return node.kind === 'group' ? [name, ...node.members] : [name];
    }),
  );
}

/**
 * Kahn's algorithm over a subset of the graph (all nodes by default).
 * Among ready nodes the earliest declared goes first.
 */
export function topologicalOrder(graph: Graph, subset?: ReadonlySet<string>): string[] {
  const keys = graph.declarationOrder.filter((key) => subset === undefined || subset.has(key));
  const included = new Set(keys);
  const position = new Map(keys.map((key, index) => [key, index]));

  const pending = new Map<string, number>();
  for (const key of keys) {
    const reqs = (graph.requires.get(key) ?? []).filter((req) => included.has(req));
    pending.set(key, reqs.length);
  }

  const ready = keys.filter((key) => pending.get(key) === 0);
  const sorted: string[] = [];

  while (ready.length > 0) {
    let best = 0;
    for (let i = 1; i < ready.length; i++) {
      if ((position.get(ready[i]) ?? 0) < (position.get(ready[best]) ?? 0)) best = i;
    }
    const [current] = ready.splice(best, 1);
    sorted.push(current);

    for (const dependent of graph.dependents.get(current) ?? []) {
      if (!included.has(dependent)) continue;
      const remaining = (pending.get(dependent) ?? 0) - 1;
      pending.set(dependent, remaining);
      if (remaining === 0) ready.push(dependent);
    }
  }

  if (sorted.length !== keys.length) {
    const cycle = findCycle(keys, graph.requires) ?? keys.filter((key) => !sorted.includes(key));
    throw new CyclicGraphError(cycle);
  }
  return sorted;
}
