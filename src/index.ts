/**
 * Public API
 */
export * from "./types";
export * from "./errors/SimulationError";
export { Vec2 } from "./math/Vec2";
export {
  createSimulationConfig,
  derivePhysicalQuantities,
  isDampingRegime,
  validatePhysicalParameters,
} from "./config/simulationConfig";
export { RandomSource, createRandomSource } from "./random/RandomSource";
export { RandomForceGenerator } from "./random/RandomForceGenerator";
export {
  OverdampedIntegrator,
  UnderdampedIntegrator,
  checkStability,
  createIntegrator,
  integrateAxis,
  type AxisState,
  type LangevinIntegrator,
} from "./dynamics/LangevinIntegrator";
export {
  createIrregularGrid,
  createRegularGrid,
  gridSize,
  gridTime,
  gridTimes,
  inferGrid,
} from "./trajectory/TimeGrid";
export { TrajectoryBuilder, simulateTrajectory } from "./trajectory/TrajectoryBuilder";
export {
  loadTrajectoryCsv,
  parseTimeSeriesCsv,
  parseTrajectoryCsv,
} from "./trajectory/TrajectoryLoader";
export * from "./msd/MSDEstimator";
export * from "./msd/RegimeClassifier";
export * from "./analysis/MSDAnalysis";
export * from "./analysis/PlotSeries";
export { SimulationDebugLogger, type SimulationDebugLog } from "./debug/SimulationDebugLogger";
