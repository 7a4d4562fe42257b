// ═══════════════════════════════════════════════════════════════
//  RK4 stepper for  x' = v,  v' = a(t, x, v)
// ═══════════════════════════════════════════════════════════════

import { scaled } from './vector';
import type { AccelerationFn, State } from './types';

/**
 * Advance `state` by one classical Runge–Kutta step of size `dt`.
 *
 * Pure: no memory between calls, identical inputs give identical outputs.
 * Local truncation error is O(dt⁵) against Euler's O(dt²); under a
 * magnetic field Euler orbits spiral outward at the same step size.
 *
 * The caller guarantees dt > 0 and a well-defined `accel`.
 */
export function rk4Step(state: State, dt: number, accel: AccelerationFn): State {
  const { time: t, position: x, velocity: v } = state;
  const half = dt / 2;

  // Stage 1 — slopes at the start
  const k1x = v;
  const k1v = accel(t, x, v);

  // Stage 2 — midpoint along k1
  const x2 = x.add(k1x.scale(half));
  const v2 = v.add(k1v.scale(half));
  const k2x = v2;
  const k2v = accel(t + half, x2, v2);

  // Stage 3 — midpoint along k2
  const x3 = x.add(k2x.scale(half));
  const v3 = v.add(k2v.scale(half));
  const k3x = v3;
  const k3v = accel(t + half, x3, v3);

  // Stage 4 — endpoint along k3
  const x4 = x.add(k3x.scale(dt));
  const v4 = v.add(k3v.scale(dt));
  const k4x = v4;
  const k4v = accel(t + dt, x4, v4);

  const w = dt / 6;
  return {
    time: t + dt,
    position: x.add(scaled(w, k1x.add(scaled(2, k2x)).add(scaled(2, k3x)).add(k4x))),
    velocity: v.add(scaled(w, k1v.add(scaled(2, k2v)).add(scaled(2, k3v)).add(k4v))),
  };
}
