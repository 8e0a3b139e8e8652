export * from './contracts/BuildingElementV1';
export * from './contracts/ThermalModelV1';
export * from './contracts/errors';
export { ASSUMPTION_IDS } from './contracts/assumptions.ids';
export type { AssumptionId } from './contracts/assumptions.ids';

export * from './engine/modules/ThermalLinkModule';
export * from './engine/modules/HeatNetworkModule';
export * from './engine/modules/StaticHeatLossModule';
export * from './engine/modules/DynamicHeatLossModule';
export * from './engine/modules/FabricInterventionModule';
export * from './engine/modules/InterventionCostModule';
export * from './engine/modules/WindowAreaEstimator';
export {
  interpolateHeatingPower,
  solveHeatBalanceEquation,
  solveImplicitStep,
} from './engine/timeline/HeatBalanceSolverV1';
export type {
  HeatBalanceInput,
  ImplicitStepInput,
  InterpolateHeatingPowerOptions,
} from './engine/timeline/HeatBalanceSolverV1';
export { simulateHeatNetwork, updateTemperatures } from './engine/timeline/HeatNetworkSimulatorV1';
export type {
  HeatNetworkSimulationPoint,
  SimulateHeatNetworkOptions,
} from './engine/timeline/HeatNetworkSimulatorV1';
export {
  costedIntervention,
  listCostedInterventions,
  materialUValue,
  parseCostedIntervention,
  MATERIAL,
} from './engine/catalog/fabricCatalog';
export { runHeatLossEngine } from './engine/Engine';
export type {
  EngineAssumptionV1,
  HeatLossEngineInput,
  HeatLossEngineResult,
  HeatLossFiguresV1,
} from './engine/Engine';
