/**
 * @hexgate/gate - Grounding middleware for text-generation calls
 */
export {
  GroundingGate,
  createGroundingGate,
  type Augmented,
  type Downstream,
  type GateOptions,
  type Groundable,
  type GroundingMiddleware,
} from './gate.js';
export { chain } from './chain.js';
