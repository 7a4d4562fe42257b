import { describe, it, expect } from 'vitest';

import { Vector2, Vector3 } from './vector';
import { UniformElectricField, UniformMagneticField } from './fields';
import { crossPlanar, lorentzForce } from './lorentz';
import { ELECTRON_CHARGE_C } from './constants';
import type { ElectricField } from './types';

describe('crossPlanar', () => {
  it('computes (vy·Bz, −vx·Bz, vx·By − vy·Bx)', () => {
    const c = crossPlanar(new Vector2(2, 3), new Vector3(5, 7, 11));
    expect(c.toTuple()).toEqual([33, -22, -1]);
  });
});

describe('lorentzForce', () => {
  it('combines E and v × B and drops the out-of-plane part', () => {
    const f = lorentzForce(
      2,
      new Vector2(1, 0),
      new UniformElectricField(new Vector2(3, 4)),
      new UniformMagneticField(new Vector3(0, 0, 5)),
      0,
      Vector2.zero(),
    );
    expect(f.x).toBe(6);
    expect(f.y).toBe(-2);
  });

  it('pushes an electron moving along +x toward +y under +Bz', () => {
    const f = lorentzForce(
      ELECTRON_CHARGE_C,
      new Vector2(1e5, 0),
      new UniformElectricField(Vector2.zero()),
      new UniformMagneticField(new Vector3(0, 0, 0.1)),
      0,
      Vector2.zero(),
    );
    expect(f.x).toBeCloseTo(0);
    expect(f.y / 1.602e-15).toBeCloseTo(1, 12);
  });

  it('queries fields at the given time and position', () => {
    const seen: [number, number, number][] = [];
    const probe: ElectricField = {
      fieldAt(time, position) {
        seen.push([time, position.x, position.y]);
        return new Vector2(position.x, time);
      },
    };
    const f = lorentzForce(
      1,
      Vector2.zero(),
      probe,
      new UniformMagneticField(Vector3.zero()),
      7,
      new Vector2(2, 9),
    );
    expect(seen).toEqual([[7, 2, 9]]);
    expect(f.toTuple()).toEqual([2, 7]);
  });
});
