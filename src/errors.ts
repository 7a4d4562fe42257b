// ═══════════════════════════════════════════════════════════════
//  Error types
// ═══════════════════════════════════════════════════════════════

export class SimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad timing config.  Thrown before any stepping; no partial result exists. */
export class InvalidConfigurationError extends SimulationError {
  constructor(readonly field: 'timeStep' | 'totalDuration' | 'frameTime', readonly value: number) {
    super(`${field} must be a positive finite number (got ${value})`);
  }
}

/** Particle that cannot be integrated (non-positive or non-finite mass). */
export class InvalidParticleError extends SimulationError {
  constructor(readonly index: number, readonly mass: number) {
    super(`particle ${index}: mass must be a positive finite number (got ${mass})`);
  }
}
