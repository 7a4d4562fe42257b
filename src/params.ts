// ═══════════════════════════════════════════════════════════════
//  Run parameters — query string / argv  ↔  RunParams
// ═══════════════════════════════════════════════════════════════

import {
  DEFAULT_BZ, DEFAULT_EX, DEFAULT_EY, DEFAULT_FRAME_TIME,
  DEFAULT_TIME_STEP, DEFAULT_V0X, DEFAULT_V0Y,
} from './constants';
import { Vector2, Vector3 } from './vector';
import { createElectron } from './particle';
import { SimulationSession } from './session';
import type { RunParams } from './types';

/** Map of param key → { default, positive-only }. */
const PARAM_KEYS: Record<keyof RunParams, { def: number; positive: boolean }> = {
  ex:      { def: DEFAULT_EX,         positive: false },
  ey:      { def: DEFAULT_EY,         positive: false },
  bz:      { def: DEFAULT_BZ,         positive: false },
  v0x:     { def: DEFAULT_V0X,        positive: false },
  v0y:     { def: DEFAULT_V0Y,        positive: false },
  dt:      { def: DEFAULT_TIME_STEP,  positive: true },
  frameDt: { def: DEFAULT_FRAME_TIME, positive: true },
};

const KEYS = ['ex', 'ey', 'bz', 'v0x', 'v0y', 'dt', 'frameDt'] as const satisfies readonly (keyof RunParams)[];

export function defaultParams(): RunParams {
  return {
    ex:      PARAM_KEYS.ex.def,
    ey:      PARAM_KEYS.ey.def,
    bz:      PARAM_KEYS.bz.def,
    v0x:     PARAM_KEYS.v0x.def,
    v0y:     PARAM_KEYS.v0y.def,
    dt:      PARAM_KEYS.dt.def,
    frameDt: PARAM_KEYS.frameDt.def,
  };
}

/** Accepts `--frame-dt=1e-6` style flags as well as `frameDt`. */
function normalizeKey(raw: string): string {
  return raw.replace(/^-+/, '').replace(/-([a-z])/g, (_m, c: string) => c.toUpperCase());
}

function isParamKey(key: string): key is keyof RunParams {
  return Object.prototype.hasOwnProperty.call(PARAM_KEYS, key);
}

/**
 * Read run parameters from a query string (`?bz=0.2&dt=1e-12`),
 * URLSearchParams, or an argv list (`['--bz=0.2', '--dt', '1e-12']`).
 * Unknown keys are ignored; unparsable values keep the default, as do
 * non-positive step sizes.
 */
export function parseParams(input: string | URLSearchParams | readonly string[]): RunParams {
  const params = defaultParams();
  const pairs: [string, string][] = [];

  if (typeof input === 'string' || input instanceof URLSearchParams) {
    const search = typeof input === 'string' ? new URLSearchParams(input) : input;
    search.forEach((value, key) => pairs.push([key, value]));
  } else {
    for (let i = 0; i < input.length; i++) {
      const arg = input[i];
      if (!arg.startsWith('--')) continue;
      const eq = arg.indexOf('=');
      if (eq >= 0) {
        pairs.push([arg.slice(0, eq), arg.slice(eq + 1)]);
      } else if (i + 1 < input.length) {
        pairs.push([arg, input[++i]]);
      }
    }
  }

  for (const [rawKey, rawValue] of pairs) {
    const key = normalizeKey(rawKey);
    if (!isParamKey(key)) continue;
    const num = Number(rawValue);
    if (rawValue.trim() === '' || !Number.isFinite(num)) continue;
    if (PARAM_KEYS[key].positive && num <= 0) continue;
    params[key] = num;
  }

  return params;
}

/** Write params back as a query string (no leading `?`), in KEYS order. */
export function serializeParams(params: RunParams): string {
  const p = new URLSearchParams();
  for (const key of KEYS) p.set(key, String(params[key]));
  return p.toString();
}

/** Default scenario: one electron at the origin in the configured fields. */
export function createScenario(params: RunParams): SimulationSession {
  return new SimulationSession({
    electricField: new Vector2(params.ex, params.ey),
    magneticField: new Vector3(0, 0, params.bz),
    particles: [createElectron(Vector2.zero(), new Vector2(params.v0x, params.v0y))],
    timeStep: params.dt,
    frameTime: params.frameDt,
  });
}
