import { describe, it, expect } from 'vitest';

import { defaultParams, parseParams, serializeParams, createScenario } from './params';
import { ELECTRON_MASS_KG, DEFAULT_BZ } from './constants';

describe('parseParams', () => {
  it('falls back to defaults for an empty query', () => {
    expect(parseParams('')).toEqual(defaultParams());
  });

  it('reads known keys from a query string and ignores the rest', () => {
    const p = parseParams('?bz=0.2&dt=1e-12&foo=3');
    expect(p.bz).toBe(0.2);
    expect(p.dt).toBe(1e-12);
    expect(p.ex).toBe(0);
    expect(p).not.toHaveProperty('foo');
  });

  it('keeps defaults for unparsable values and non-positive steps', () => {
    const p = parseParams('bz=abc&dt=-1&frameDt=0&ex=');
    expect(p.bz).toBe(DEFAULT_BZ);
    expect(p.dt).toBe(5e-12);
    expect(p.frameDt).toBe(1e-6);
    expect(p.ex).toBe(0);
  });

  it('accepts argv flags in both --key=value and --key value form', () => {
    const p = parseParams(['--bz=0.3', '--frame-dt', '2e-6', 'stray', '--v0x', '5']);
    expect(p.bz).toBe(0.3);
    expect(p.frameDt).toBe(2e-6);
    expect(p.v0x).toBe(5);
  });

  it('accepts negative field values', () => {
    expect(parseParams('ey=-250').ey).toBe(-250);
  });
});

describe('serializeParams', () => {
  it('writes every key in a fixed order', () => {
    expect(serializeParams(defaultParams())).toBe(
      'ex=0&ey=0&bz=0.1&v0x=100000&v0y=0&dt=5e-12&frameDt=0.000001',
    );
  });

  it('reads back what it writes', () => {
    const p = { ...defaultParams(), ex: 1500, bz: -0.05, v0y: 2e4 };
    expect(parseParams(serializeParams(p))).toEqual(p);
  });
});

describe('createScenario', () => {
  it('puts one electron at the origin in the configured fields', () => {
    const session = createScenario(parseParams('bz=0.2&ex=10&v0y=3'));
    const [e] = session.particles;

    expect(session.particles).toHaveLength(1);
    expect(e.mass).toBe(ELECTRON_MASS_KG);
    expect(e.position.toTuple()).toEqual([0, 0]);
    expect(e.velocity.toTuple()).toEqual([1e5, 3]);
    expect(session.magnetic.value.toTuple()).toEqual([0, 0, 0.2]);
    expect(session.electric.value.toTuple()).toEqual([10, 0]);
    expect(session.frameSteps).toBe(200000);
  });
});
