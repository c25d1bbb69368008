// keepaway-core: pure simulation logic (model, transform, relief, simulator)
// No HTTP, no logging, no I/O. Every function is synchronous and testable.

export const KEEPAWAY_CORE_VERSION = '0.1.0';

export * from './types';
export * from './errors';
export { checkedAdd, checkedMul, INT64_MAX, INT64_MIN } from './checked-math';
export { applyOperation } from './transform';
export { passesTest, selectTarget } from './divisibility';
export {
  applyRelief,
  computeModulus,
  createReliefPolicy,
  describeRelief,
  type DivideRelief,
  type ModulusRelief,
  type ReliefPolicy,
} from './relief';
export { InspectionCounter } from './inspection-counter';
export {
  monkeyBusiness,
  runCustom,
  runLong,
  runPreset,
  runShort,
  runSimulation,
  type RoundSnapshot,
  type RunOptions,
  type SimulationReport,
} from './simulator';
export {
  loadSimulation,
  toDefinition,
  troopDefinitionSchema,
  type MonkeyDefinition,
  type TroopDefinition,
} from './definition';
export { parseTroop, parseTroopDefinition } from './parser';
export { generateRandomTroop, type RandomTroopOptions } from './scenarios/random-troop';
