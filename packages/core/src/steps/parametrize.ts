// packages/core/src/steps/parametrize.ts: Expansion of step specs into concrete nodes

import type { StepNode } from '../types/graph.js';
import type { ParameterValue, StepBody, StepHandler, StepParameter, StepSpec } from '../types/step.js';
import { ParameterError } from '../utils/errors.js';

/** Placeholder names filled by command steps, not available as parameters. */
export const RESERVED_PARAMETERS: ReadonlySet<string> = new Set(['args', 'cache', 'env']);

const PARAMETER_NAME = /^[A-Za-z_][A-Za-z0-9_-]*$/;

export interface ParameterCombination {
  /** Joined display ids, empty for an unparametrized step. */
  id: string;
  key: string;
  parameters: Record<string, ParameterValue>;
  /** False when any bound value is marked as not run by default. */
  runByDefault: boolean;
}

/** Canonical node key: `name` or `name[id1,id2]`. Empty ids are left out. */
export function formatNodeKey(name: string, ids: readonly string[]): string {
  const visible = ids.filter((id) => id !== '');
  return visible.length === 0 ? name : `${name}[${visible.join(',')}]`;
}

/** Replace `{name}` placeholders with values. Unknown placeholders stay as written. */
export function renderTemplate(
  template: string,
  values: Readonly<Record<string, ParameterValue>>,
): string {
  return template.replace(/\{([A-Za-z_][A-Za-z0-9_-]*)\}/g, (match, name: string) =>
    Object.hasOwn(values, name) ? String(values[name]) : match,
  );
}

export function validateParameters(stepName: string, parameters: readonly StepParameter[]): void {
  const seen = new Set<string>();
  for (const param of parameters) {
    if (!PARAMETER_NAME.test(param.name)) {
      throw new ParameterError(`'${param.name}' is not a valid parameter name`, stepName);
    }
    if (RESERVED_PARAMETERS.has(param.name)) {
      throw new ParameterError(`'${param.name}' is reserved and cannot be a parameter`, stepName);
    }
    if (seen.has(param.name)) {
      throw new ParameterError(`'${param.name}' was already specified previously`, stepName);
    }
    seen.add(param.name);
    if (param.values.length === 0) {
      throw new ParameterError(`'${param.name}' has no values`, stepName);
    }
    if (param.ids !== undefined && param.ids.length !== param.values.length) {
      throw new ParameterError(
        `${param.values.length} values were passed for '${param.name}', but ${param.ids.length} ids were given`,
        stepName,
      );
    }
    if (param.runByDefault !== undefined && param.runByDefault.length !== param.values.length) {
      throw new ParameterError(
        `${param.values.length} values were passed for '${param.name}', but ${param.runByDefault.length} runByDefault flags were given`,
        stepName,
      );
    }
  }
}

/**
 * Cartesian product of the parameter axes. The first declared parameter
 * varies slowest, values keep their given order. A single combination is
 * keyed by the bare name.
 */
export function expandParameters(
  name: string,
  parameters: readonly StepParameter[] = [],
): ParameterCombination[] {
  let combos: Array<{
    ids: string[];
    parameters: Record<string, ParameterValue>;
    runByDefault: boolean;
  }> = [{ ids: [], parameters: {}, runByDefault: true }];

  for (const param of parameters) {
    const next: typeof combos = [];
    for (const combo of combos) {
      param.values.forEach((value, index) => {
        next.push({
          ids: [...combo.ids, param.ids?.[index] ?? String(value)],
          parameters: { ...combo.parameters, [param.name]: value },
          runByDefault: combo.runByDefault && (param.runByDefault?.[index] ?? true),
        });
      });
    }
    combos = next;
  }

  const single = combos.length === 1;
  return combos.map((combo) => ({
    id: combo.ids.filter((id) => id !== '').join(','),
    key: single ? name : formatNodeKey(name, combo.ids),
    parameters: combo.parameters,
    runByDefault: combo.runByDefault,
  }));
}

export function normalizeBody(body: StepBody): StepHandler {
  return typeof body === 'function' ? { run: body } : body;
}

/**
 * Deterministically expand a spec into its ordered step nodes. Placeholders
 * in the description, requirements, dependencies and `setenv` values are
 * filled per variant.
 */
export function expandStep(spec: StepSpec): StepNode[] {
  const parameters = spec.parameters ?? [];
  validateParameters(spec.name, parameters);
  const handler = normalizeBody(spec.body);

  return expandParameters(spec.name, parameters).map((combo): StepNode => {
    const render = (text: string): string => renderTemplate(text, combo.parameters);
    return {
      kind: 'step',
      key: combo.key,
      name: spec.name,
      description: spec.description === undefined ? undefined : render(spec.description),
      parameters: combo.parameters,
      requires: (spec.requires ?? []).map(render),
      dependencies: (spec.dependencies ?? []).map(render),
      runByDefault: (spec.runByDefault ?? true) && combo.runByDefault,
      passenv: [...(spec.passenv ?? [])],
      setenv: Object.fromEntries(
        Object.entries(spec.setenv ?? {}).map(([name, value]) => [name, render(value)]),
      ),
      handler,
    };
  });
}
