/**
 * Mean synodic moon phase for an instant.
 * Counts days from a known new moon; no ephemeris involved.
 */

export type LunarPhaseName =
  | "new"
  | "waxing_crescent"
  | "first_quarter"
  | "waxing_gibbous"
  | "full"
  | "waning_gibbous"
  | "last_quarter"
  | "waning_crescent";

export interface LunarPhase {
  phase_name: LunarPhaseName;
  /** Position in the cycle, 0 = new, 0.5 = full. */
  cycle_fraction: number;
  /** Directed Moon − Sun elongation in [0, 360). */
  elongation_deg: number;
  illumination_pct: number;
}

export const SYNODIC_MONTH_DAYS = 29.530588;
export const REFERENCE_NEW_MOON = new Date(Date.UTC(2000, 0, 6, 18, 14));

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function normalizeDegrees(value: number): number {
  let v = value % 360;
  if (v < 0) v += 360;
  return v;
}

/**
 * Phase boundaries sit halfway between the principal phases
 * (0°, 90°, 180°, 270°), 45° wide each.
 */
function phaseNameFromElongation(elongationDeg: number): LunarPhaseName {
  const angle = normalizeDegrees(elongationDeg);

  if (angle < 22.5 || angle >= 337.5) {
    return "new";
  } else if (angle < 67.5) {
    return "waxing_crescent";
  } else if (angle < 112.5) {
    return "first_quarter";
  } else if (angle < 157.5) {
    return "waxing_gibbous";
  } else if (angle < 202.5) {
    return "full";
  } else if (angle < 247.5) {
    return "waning_gibbous";
  } else if (angle < 292.5) {
    return "last_quarter";
  } else {
    return "waning_crescent";
  }
}

/**
 * illumination = (1 − cos(elongation)) / 2
 */
function illuminationFromElongation(elongationDeg: number): number {
  const rad = (elongationDeg * Math.PI) / 180;
  const illumination = (1 - Math.cos(rad)) / 2;
  return Number((illumination * 100).toFixed(2));
}

export function computeLunarPhase(instant: Date): LunarPhase {
  const daysSince = (instant.getTime() - REFERENCE_NEW_MOON.getTime()) / MS_PER_DAY;
  let position = daysSince % SYNODIC_MONTH_DAYS;
  if (position < 0) position += SYNODIC_MONTH_DAYS;

  const cycleFraction = position / SYNODIC_MONTH_DAYS;
  const elongation = normalizeDegrees(cycleFraction * 360);

  return {
    phase_name: phaseNameFromElongation(elongation),
    cycle_fraction: Number(cycleFraction.toFixed(4)),
    elongation_deg: Number(elongation.toFixed(4)),
    illumination_pct: illuminationFromElongation(elongation),
  };
}
