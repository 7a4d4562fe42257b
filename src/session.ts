// ═══════════════════════════════════════════════════════════════
//  Interactive session — frame stepping, live tuning, reset
// ═══════════════════════════════════════════════════════════════
//
//  Drives the engine the way a renderer does: short runs of one frame's
//  worth of simulated time, with field and velocity nudges in between.
//  Holds no drawing code; callers read `particles` and `trail()`.

import { B_ADJUST_STEP, E_ADJUST_STEP, MAX_TRAIL_POINTS, V_ADJUST_STEP } from './constants';
import { Vector3 } from './vector';
import { UniformElectricField, UniformMagneticField } from './fields';
import { SimulationEngine } from './engine';
import { InvalidConfigurationError } from './errors';
import { createLogger } from './logger';
import type { Vector2 } from './vector';
import type { Particle } from './particle';
import type { SimulationResult } from './types';

const log = createLogger('session');

export interface SessionOptions {
  electricField: Vector2;   // V/m
  magneticField: Vector3;   // T
  particles: readonly Particle[];
  timeStep: number;         // s
  frameTime: number;        // s, max simulated time per frame
  maxTrailPoints?: number;
}

interface Snapshot {
  position: Vector2;
  velocity: Vector2;
}

export class SimulationSession {
  readonly particles: readonly Particle[];
  readonly electric: UniformElectricField;
  readonly magnetic: UniformMagneticField;
  readonly engine: SimulationEngine;
  readonly timeStep: number;
  readonly frameTime: number;

  time = 0;
  paused = false;

  private readonly initialE: Vector2;
  private readonly initialB: Vector3;
  private readonly initialKinematics: Snapshot[];
  private readonly trails = new Map<number, Vector2[]>();
  private readonly maxTrailPoints: number;

  constructor(opts: SessionOptions) {
    if (!(opts.timeStep > 0) || !Number.isFinite(opts.timeStep)) {
      throw new InvalidConfigurationError('timeStep', opts.timeStep);
    }
    if (!(opts.frameTime > 0) || !Number.isFinite(opts.frameTime)) {
      throw new InvalidConfigurationError('frameTime', opts.frameTime);
    }

    // Own copy: the snapshot below is index-aligned with this list.
    this.particles = [...opts.particles];
    this.timeStep = opts.timeStep;
    this.frameTime = opts.frameTime;
    this.maxTrailPoints = opts.maxTrailPoints ?? MAX_TRAIL_POINTS;

    this.initialE = opts.electricField;
    this.initialB = opts.magneticField;
    this.initialKinematics = this.particles.map(p => ({ position: p.position, velocity: p.velocity }));

    this.electric = new UniformElectricField(opts.electricField);
    this.magnetic = new UniformMagneticField(opts.magneticField);
    this.engine = new SimulationEngine(this.electric, this.magnetic);
  }

  /** Steps per frame; never zero, even when frameTime < timeStep. */
  get frameSteps(): number {
    return Math.max(1, Math.floor(this.frameTime / this.timeStep));
  }

  /** Run one frame of exactly `frameSteps` steps.  Returns null while paused. */
  advanceFrame(): SimulationResult | null {
    if (this.paused) return null;

    const result = this.engine.run(
      this.particles,
      {
        timeStep: this.timeStep,
        // n·dt / dt can floor to n − 1; the half step keeps it at n
        totalDuration: (this.frameSteps + 0.5) * this.timeStep,
        recordTrajectory: false,
      },
      this.time,
    );

    if (result.finalStates.length > 0) this.time = result.finalStates[0].time;
    for (const p of this.particles) this.pushTrail(p.id, p.position);
    return result;
  }

  adjustElectricField(delta: Vector2): void {
    this.electric.value = this.electric.value.add(delta);
  }

  adjustMagneticField(dBz: number): void {
    this.magnetic.value = this.magnetic.value.add(new Vector3(0, 0, dBz));
  }

  /** Applied to every particle. */
  adjustVelocity(delta: Vector2): void {
    for (const p of this.particles) p.adjustVelocity(delta);
  }

  /** One control tick on E: each component of `direction` is −1, 0 or 1. */
  nudgeElectricField(direction: Vector2): void {
    this.adjustElectricField(direction.scale(E_ADJUST_STEP));
  }

  nudgeMagneticField(direction: -1 | 1): void {
    this.adjustMagneticField(direction * B_ADJUST_STEP);
  }

  nudgeVelocity(direction: Vector2): void {
    this.adjustVelocity(direction.scale(V_ADJUST_STEP));
  }

  togglePause(): boolean {
    this.paused = !this.paused;
    return this.paused;
  }

  /** Restore initial fields and kinematics, rewind time, clear trails. */
  reset(): void {
    this.time = 0;
    this.electric.value = this.initialE;
    this.magnetic.value = this.initialB;
    this.particles.forEach((p, i) => {
      p.setPosition(this.initialKinematics[i].position);
      p.setVelocity(this.initialKinematics[i].velocity);
    });
    this.trails.clear();
    log.info(`reset ${this.particles.length} particles`);
  }

  /** Recorded positions for a particle, oldest first. */
  trail(particle: Particle): readonly Vector2[] {
    return this.trails.get(particle.id) ?? [];
  }

  private pushTrail(id: number, position: Vector2): void {
    let points = this.trails.get(id);
    if (!points) {
      points = [];
      this.trails.set(id, points);
    }
    points.push(position);
    if (points.length > this.maxTrailPoints) points.splice(0, points.length - this.maxTrailPoints);
  }
}
