// ═══════════════════════════════════════════════════════════════
//  Global constants
// ═══════════════════════════════════════════════════════════════

// ── Electron properties ─────────────────────────────────────
export const ELECTRON_MASS_KG  = 9.109e-31;   // kg
export const ELECTRON_CHARGE_C = -1.602e-19;  // C

// ── Default run setup ───────────────────────────────────────
export const DEFAULT_EX        = 0;       // V/m
export const DEFAULT_EY        = 0;       // V/m
export const DEFAULT_BZ        = 0.1;     // T
export const DEFAULT_V0X       = 1e5;     // m/s
export const DEFAULT_V0Y       = 0;       // m/s
export const DEFAULT_TIME_STEP = 5e-12;   // s, physics step
export const DEFAULT_FRAME_TIME = 1e-6;   // s, max simulated time per frame

// ── Interactive nudges (per key press / control tick) ───────
export const E_ADJUST_STEP = 1e4;    // V/m
export const B_ADJUST_STEP = 0.01;   // T
export const V_ADJUST_STEP = 1e4;    // m/s

/** Oldest trail points beyond this count are dropped. */
export const MAX_TRAIL_POINTS = 500;

// ── Energy-conservation tolerances ──────────────────────────
export const ENERGY_REL_TOL = 1e-3;
export const ENERGY_ABS_TOL = 1e-12;  // J
