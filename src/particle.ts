// ═══════════════════════════════════════════════════════════════
//  Particle — the only mutable entity the engine touches
// ═══════════════════════════════════════════════════════════════

import { ELECTRON_CHARGE_C, ELECTRON_MASS_KG } from './constants';
import type { Vector2 } from './vector';

let nextId = 1;

export interface ParticleInit {
  position: Vector2;
  velocity: Vector2;
  mass: number;    // kg
  charge: number;  // C
  /** Stable key for per-particle side state; allocated when omitted. */
  id?: number;
}

/**
 * Kinematic record owned by the caller.  The engine reads the initial
 * position/velocity and writes the final ones back in place.
 */
export class Particle {
  readonly id: number;
  position: Vector2;
  velocity: Vector2;
  readonly mass: number;
  readonly charge: number;

  constructor(init: ParticleInit) {
    this.id = init.id ?? nextId++;
    this.position = init.position;
    this.velocity = init.velocity;
    this.mass = init.mass;
    this.charge = init.charge;
  }

  setPosition(position: Vector2): void {
    this.position = position;
  }

  setVelocity(velocity: Vector2): void {
    this.velocity = velocity;
  }

  /** Shift position without applying any force. */
  translate(delta: Vector2): void {
    this.position = this.position.add(delta);
  }

  adjustVelocity(delta: Vector2): void {
    this.velocity = this.velocity.add(delta);
  }
}

export function createElectron(position: Vector2, velocity: Vector2, id?: number): Particle {
  return new Particle({
    position,
    velocity,
    mass: ELECTRON_MASS_KG,
    charge: ELECTRON_CHARGE_C,
    id,
  });
}
