// ═══════════════════════════════════════════════════════════════
//  Simulation engine — N particles stepped in lockstep
// ═══════════════════════════════════════════════════════════════

import { Vector2 } from './vector';
import { lorentzForce } from './lorentz';
import { rk4Step } from './integrator';
import { InvalidConfigurationError, InvalidParticleError } from './errors';
import { createLogger } from './logger';
import type { Particle } from './particle';
import type {
  AccelerationFn,
  ElectricField,
  MagneticField,
  SimulationConfig,
  SimulationResult,
  State,
} from './types';

const log = createLogger('engine');

/** Whole steps that fit in the duration; the remainder is dropped, not rounded. */
export function stepCount(config: SimulationConfig): number {
  return Math.floor(config.totalDuration / config.timeStep);
}

function validate(particles: readonly Particle[], config: SimulationConfig): void {
  if (!(config.timeStep > 0) || !Number.isFinite(config.timeStep)) {
    throw new InvalidConfigurationError('timeStep', config.timeStep);
  }
  if (!(config.totalDuration > 0) || !Number.isFinite(config.totalDuration)) {
    throw new InvalidConfigurationError('totalDuration', config.totalDuration);
  }
  particles.forEach((p, i) => {
    if (!(p.mass > 0) || !Number.isFinite(p.mass)) throw new InvalidParticleError(i, p.mass);
  });
}

/**
 * Advances particles through time under one electric and one magnetic field.
 *
 * Fields are held by reference and read on every force evaluation, never
 * snapshotted, so a caller may retune them between runs.
 */
export class SimulationEngine {
  constructor(
    readonly electricField: ElectricField,
    readonly magneticField: MagneticField,
  ) {}

  /** Acceleration closure bound to one particle's charge and mass. */
  accelerationFor(particle: Particle): AccelerationFn {
    const { charge, mass } = particle;
    return (time, position, velocity) => {
      const f = lorentzForce(charge, velocity, this.electricField, this.magneticField, time, position);
      return new Vector2(f.x / mass, f.y / mass);
    };
  }

  /**
   * Integrate every particle for floor(totalDuration / timeStep) RK4 steps
   * starting at `startTime`, then write final kinematics back into the
   * same particle objects.
   *
   * When recording, each trajectory starts with the initial state and
   * holds steps + 1 samples.
   */
  run(particles: readonly Particle[], config: SimulationConfig, startTime = 0): SimulationResult {
    validate(particles, config);

    const t0 = performance.now();
    const steps = stepCount(config);
    const dt = config.timeStep;

    const states: State[] = particles.map(p => ({
      time: startTime,
      position: p.position,
      velocity: p.velocity,
    }));
    const trajectories: State[][] = states.map(s => (config.recordTrajectory ? [s] : []));
    const accels = particles.map(p => this.accelerationFor(p));

    for (let step = 0; step < steps; step++) {
      for (let i = 0; i < states.length; i++) {
        const next = rk4Step(states[i], dt, accels[i]);
        states[i] = next;
        if (config.recordTrajectory) trajectories[i].push(next);
      }
    }

    particles.forEach((p, i) => {
      p.position = states[i].position;
      p.velocity = states[i].velocity;
    });

    log.debug(
      `${particles.length} particles · ${steps} steps · ${(performance.now() - t0).toFixed(1)} ms`,
    );

    return { finalStates: states, trajectories };
  }
}
