// ═══════════════════════════════════════════════════════════════
//  Field models — electric (2-D) and magnetic (3-D)
// ═══════════════════════════════════════════════════════════════
//
//  Only uniform fields exist today.  Anything that varies in space or
//  time implements the same interface and slots into the force law
//  and engine without touching them.

import type { Vector2, Vector3 } from './vector';
import type { ElectricField, MagneticField } from './types';

/**
 * Spatially and temporally constant electric field.
 *
 * `value` is a live handle: the engine reads it on every evaluation,
 * so retargeting it between runs changes subsequent forces.
 */
export class UniformElectricField implements ElectricField {
  constructor(public value: Vector2) {}

  fieldAt(_time: number, _position: Vector2): Vector2 {
    return this.value;
  }
}

/** Spatially and temporally constant magnetic field; `value` is live as above. */
export class UniformMagneticField implements MagneticField {
  constructor(public value: Vector3) {}

  fieldAt(_time: number, _position: Vector2): Vector3 {
    return this.value;
  }
}
