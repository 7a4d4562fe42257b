// ═══════════════════════════════════════════════════════════════
//  Type definitions for the particle engine
// ═══════════════════════════════════════════════════════════════

import type { Vector2, Vector3 } from './vector';

/** Electric field model: in-plane field (V/m) at a space-time point. */
export interface ElectricField {
  fieldAt(time: number, position: Vector2): Vector2;
}

/** Magnetic field model (T). Keeps z so out-of-plane fields act on in-plane motion. */
export interface MagneticField {
  fieldAt(time: number, position: Vector2): Vector3;
}

/** Timestamped snapshot of one particle. */
export interface State {
  readonly time: number;      // s
  readonly position: Vector2; // m
  readonly velocity: Vector2; // m/s
}

/** a(t, x, v) in m/s², supplied to the integrator by the engine. */
export type AccelerationFn = (time: number, position: Vector2, velocity: Vector2) => Vector2;

/** Timing for one engine run. */
export interface SimulationConfig {
  timeStep: number;       // s, must be > 0
  totalDuration: number;  // s, must be > 0
  recordTrajectory: boolean;
}

/** Output of SimulationEngine.run, index-aligned with the input particles. */
export interface SimulationResult {
  finalStates: State[];
  /** One trajectory per particle; each is empty when recording is off. */
  trajectories: State[][];
}

/** How the two energy tolerances combine. */
export type ToleranceMode = 'either' | 'both';

export interface EnergyCheckOptions {
  relTol?: number;
  absTol?: number;
  mode?: ToleranceMode;
}

/** Per-particle energy stability summary (magnetic-only runs). */
export interface EnergyConservationCheck {
  passed: boolean;
  maxRelativeDeviation: number[];
  maxAbsoluteDeviation: number[];  // J
}

/** Command-surface parameters, see params.ts. */
export interface RunParams {
  ex: number;       // V/m
  ey: number;       // V/m
  bz: number;       // T
  v0x: number;      // m/s
  v0y: number;      // m/s
  dt: number;       // s
  frameDt: number;  // s
}
