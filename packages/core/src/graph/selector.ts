// packages/core/src/graph/selector.ts: CLI filters to execution plan

import type { Graph } from '../types/graph.js';
import type { ExecutionPlan, Phase, SelectionOptions, SelectionWarning } from '../types/plan.js';
import { SelectionError } from '../utils/errors.js';
import { expandNames, requirementClosure, topologicalOrder } from './builder.js';

function resolvePhase(options: SelectionOptions): Phase {
  if (options.setupOnly && options.noSetup) {
    throw new SelectionError('--setup-only and --no-setup are mutually exclusive');
  }
  if (options.setupOnly) return 'setup-only';
  if (options.noSetup) return 'run-only';
  return 'full';
}

/**
 * Starting nodes among the candidates, minus the excluded ones. A group that
 * lost a member is replaced by the rest of its members.
 */
function startingNodes(
  graph: Graph,
  candidates: readonly string[],
  excluded: ReadonlySet<string>,
): string[] {
  const roots: string[] = [];
  for (const key of candidates) {
    const node = graph.nodes.get(key);
    if (!node || excluded.has(key)) continue;
    if (node.kind === 'group' && node.members.some((member) => excluded.has(member))) {
      roots.push(...node.members.filter((member) => !excluded.has(member)));
      continue;
    }
    roots.push(key);
  }
  return roots;
}

function defaultCandidates(graph: Graph): string[] {
  return graph.declarationOrder.filter((key) => graph.nodes.get(key)?.runByDefault === true);
}

export function select(graph: Graph, options: SelectionOptions = {}): ExecutionPlan {
  const only = options.only ?? [];
  const except = options.except ?? [];
  const roots = options.roots ?? [];
  if (only.length > 0 && except.length > 0) {
    throw new SelectionError('--only and --except are mutually exclusive');
  }
  if (only.length > 0 && roots.length > 0) {
    throw new SelectionError('Step names cannot be combined with --only');
  }
  const phase = resolvePhase(options);

  let selected: Set<string>;
  let excluded = new Set<string>();
  if (only.length > 0) {
    expandNames(graph, only);
    selected = requirementClosure(graph, only);
  } else {
    excluded = new Set(expandNames(graph, except));
    if (roots.length > 0) expandNames(graph, roots);
    const candidates = roots.length > 0 ? [...new Set(roots)] : defaultCandidates(graph);
    selected = requirementClosure(graph, startingNodes(graph, candidates, excluded));
  }

  const order = topologicalOrder(graph, selected);
  const warnings: SelectionWarning[] = [];

  const entries = order.map((key) => {
    const excludedButRequired = excluded.has(key);
    if (excludedButRequired) {
      const dependents = (graph.dependents.get(key) ?? []).filter((d) => selected.has(d));
      const requiredBy = dependents.find((d) => !excluded.has(d)) ?? dependents[0] ?? key;
      warnings.push({
        key,
        requiredBy,
        message: `'${key}' was excluded but is required by '${requiredBy}', it will run anyway`,
      });
    }
    return {
      key,
      phase,
      requires: graph.requires.get(key) ?? [],
      excludedButRequired,
    };
  });

  return { entries, phase, warnings };
}
