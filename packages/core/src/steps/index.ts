export { createCommandBody, renderCommand } from './command-body.js';
export type { CommandBodyOptions } from './command-body.js';
export {
  RESERVED_PARAMETERS,
  expandParameters,
  expandStep,
  formatNodeKey,
  normalizeBody,
  renderTemplate,
  validateParameters,
} from './parametrize.js';
export type { ParameterCombination } from './parametrize.js';
export { StepRegistry } from './registry.js';
export { loadStepfile, parseStepfile, validateStepfile } from './stepfile.js';
export type { ParseStepfileOptions, StepfileDocument } from './stepfile.js';
