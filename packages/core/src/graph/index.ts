export {
  buildGraph,
  expandNames,
  findCycle,
  getNode,
  isGroup,
  requirementClosure,
  topologicalOrder,
} from './builder.js';
export { select } from './selector.js';
