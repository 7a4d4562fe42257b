// ═══════════════════════════════════════════════════════════════
//  Lorentz force  F = q (E + v × B)
// ═══════════════════════════════════════════════════════════════

import { Vector2, Vector3 } from './vector';
import type { ElectricField, MagneticField } from './types';

/** v × B with v = (vx, vy, 0). */
export function crossPlanar(v: Vector2, b: Vector3): Vector3 {
  return new Vector3(
    v.y * b.z,
    -v.x * b.z,
    v.x * b.y - v.y * b.x,
  );
}

/**
 * In-plane Lorentz force (N) on a charge moving in the plane.
 *
 * The z component of v × B would push the particle out of the plane;
 * motion is restricted to 2-D, so it is dropped.
 */
export function lorentzForce(
  charge: number,
  velocity: Vector2,
  electric: ElectricField,
  magnetic: MagneticField,
  time: number,
  position: Vector2,
): Vector2 {
  const e = electric.fieldAt(time, position);
  const b = magnetic.fieldAt(time, position);
  const vxb = crossPlanar(velocity, b);

  return new Vector2(
    charge * (e.x + vxb.x),
    charge * (e.y + vxb.y),
  );
}
