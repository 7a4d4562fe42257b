// ═══════════════════════════════════════════════════════════════
//  Diagnostics — kinetic-energy conservation under magnetic fields
// ═══════════════════════════════════════════════════════════════
//
//  Magnetic force is always perpendicular to velocity and does no work,
//  so with E = 0 every particle's kinetic energy must stay flat.

import { ENERGY_ABS_TOL, ENERGY_REL_TOL } from './constants';
import type { Vector2 } from './vector';
import type { Particle } from './particle';
import type { EnergyCheckOptions, EnergyConservationCheck, State } from './types';

/** ½ m |v|²  (J). */
export function kineticEnergy(mass: number, velocity: Vector2): number {
  return 0.5 * mass * (velocity.x * velocity.x + velocity.y * velocity.y);
}

/**
 * Check each recorded trajectory against its first sample's energy.
 *
 * Trajectories are index-aligned with `particles`.  A particle passes when
 * its max relative deviation is within `relTol` or (mode 'either', the
 * default) its max absolute deviation is within `absTol`; mode 'both'
 * requires both.  At electron scale the absolute bound alone is almost
 * always met, so 'both' is the stricter check.
 *
 * Never throws; an empty trajectory passes with zero deviation.
 */
export function verifyMagneticEnergyConservation(
  particles: readonly Pick<Particle, 'mass'>[],
  trajectories: readonly (readonly State[])[],
  options: EnergyCheckOptions = {},
): EnergyConservationCheck {
  const relTol = options.relTol ?? ENERGY_REL_TOL;
  const absTol = options.absTol ?? ENERGY_ABS_TOL;
  const mode = options.mode ?? 'either';

  const maxRelativeDeviation: number[] = [];
  const maxAbsoluteDeviation: number[] = [];

  const n = Math.min(particles.length, trajectories.length);
  for (let i = 0; i < n; i++) {
    const mass = particles[i].mass;
    const samples = trajectories[i];

    if (samples.length === 0) {
      maxRelativeDeviation.push(0);
      maxAbsoluteDeviation.push(0);
      continue;
    }

    const e0 = kineticEnergy(mass, samples[0].velocity);
    const denom = e0 !== 0 ? e0 : 1;  // E0 = 0 would make relative error undefined
    let rel = 0;
    let abs = 0;

    for (const s of samples) {
      const d = Math.abs(kineticEnergy(mass, s.velocity) - e0);
      abs = Math.max(abs, d);
      rel = Math.max(rel, d / denom);
    }

    maxRelativeDeviation.push(rel);
    maxAbsoluteDeviation.push(abs);
  }

  const passed = maxRelativeDeviation.every((rel, i) => {
    const relOk = rel <= relTol;
    const absOk = maxAbsoluteDeviation[i] <= absTol;
    return mode === 'both' ? relOk && absOk : relOk || absOk;
  });

  return { passed, maxRelativeDeviation, maxAbsoluteDeviation };
}
