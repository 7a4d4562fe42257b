// ═══════════════════════════════════════════════════════════════
//  Public API
// ═══════════════════════════════════════════════════════════════

export * from './constants';
export { Vector2, Vector3, scaled } from './vector';
export { UniformElectricField, UniformMagneticField } from './fields';
export { Particle, createElectron } from './particle';
export type { ParticleInit } from './particle';
export { lorentzForce, crossPlanar } from './lorentz';
export { rk4Step } from './integrator';
export { SimulationEngine, stepCount } from './engine';
export { kineticEnergy, verifyMagneticEnergyConservation } from './diagnostics';
export { SimulationError, InvalidConfigurationError, InvalidParticleError } from './errors';
export { createLogger, setLogLevel, getLogLevel } from './logger';
export type { Logger, LogLevel } from './logger';
export { parseParams, serializeParams, defaultParams, createScenario } from './params';
export { SimulationSession } from './session';
export type { SessionOptions } from './session';
export type {
  ElectricField,
  MagneticField,
  State,
  AccelerationFn,
  SimulationConfig,
  SimulationResult,
  ToleranceMode,
  EnergyCheckOptions,
  EnergyConservationCheck,
  RunParams,
} from './types';
