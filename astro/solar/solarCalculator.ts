/**
 * Pure solar-position functions.
 *
 * Two calculation profiles live here side by side:
 * - precise: solves the hour angle for a target elevation per coordinate
 *   and applies equation-of-time and longitude corrections (eventTime).
 * - approximate: the legacy clamped sunrise hour used only by the daylight
 *   visualization (sunriseHourApprox). Cheaper and deliberately coarse.
 *
 * Elevations the sun never reaches resolve to null. Nothing here throws for
 * polar day or polar night.
 */

import { dayOfYear, utcMidnight } from "../calendar/calendarDate.js";
import type { GeoCoordinate } from "../schemas/geoCoordinate.schema.js";

const D2R = Math.PI / 180;
const R2D = 180 / Math.PI;
const MS_PER_HOUR = 60 * 60 * 1000;

export type SolarEvent =
  | "sunrise"
  | "sunset"
  | "civilTwilightStart"
  | "civilTwilightEnd"
  | "nauticalTwilightStart"
  | "nauticalTwilightEnd"
  | "astronomicalTwilightStart"
  | "astronomicalTwilightEnd";

/**
 * Sun elevation (degrees) that defines each event family.
 * Sunrise/sunset includes the standard refraction correction.
 */
export const ELEVATION_THRESHOLDS = {
  sunrise: -0.83,
  civil: -6,
  nautical: -12,
  astronomical: -18,
} as const;

const EVENT_ELEVATIONS: Record<SolarEvent, { elevation: number; isRising: boolean }> = {
  sunrise: { elevation: ELEVATION_THRESHOLDS.sunrise, isRising: true },
  sunset: { elevation: ELEVATION_THRESHOLDS.sunrise, isRising: false },
  civilTwilightStart: { elevation: ELEVATION_THRESHOLDS.civil, isRising: true },
  civilTwilightEnd: { elevation: ELEVATION_THRESHOLDS.civil, isRising: false },
  nauticalTwilightStart: { elevation: ELEVATION_THRESHOLDS.nautical, isRising: true },
  nauticalTwilightEnd: { elevation: ELEVATION_THRESHOLDS.nautical, isRising: false },
  astronomicalTwilightStart: { elevation: ELEVATION_THRESHOLDS.astronomical, isRising: true },
  astronomicalTwilightEnd: { elevation: ELEVATION_THRESHOLDS.astronomical, isRising: false },
};

export const SOLAR_EVENTS: readonly SolarEvent[] = [
  "astronomicalTwilightStart",
  "nauticalTwilightStart",
  "civilTwilightStart",
  "sunrise",
  "sunset",
  "civilTwilightEnd",
  "nauticalTwilightEnd",
  "astronomicalTwilightEnd",
];

function dayAngle(day: number): number {
  return (2 * Math.PI * (day - 81)) / 365;
}

/**
 * Solar declination in radians: 23.45° · sin(2π(d − 81)/365).
 */
export function solarDeclination(day: number): number {
  return 23.45 * Math.sin(dayAngle(day)) * D2R;
}

/**
 * Equation of time in minutes (apparent minus mean solar time).
 */
export function equationOfTimeMinutes(day: number): number {
  const b = dayAngle(day);
  return 9.87 * Math.sin(2 * b) - 7.53 * Math.cos(b) - 1.5 * Math.sin(b);
}

/**
 * Hour angle (degrees) at which the sun crosses the target elevation,
 * or null when it never does on that day at that latitude.
 *
 * @param declination - radians
 */
export function hourAngleForElevation(
  latitude: number,
  declination: number,
  targetElevationDegrees: number
): number | null {
  const lat = latitude * D2R;
  const elev = targetElevationDegrees * D2R;
  const cosHA =
    (Math.sin(elev) - Math.sin(lat) * Math.sin(declination)) /
    (Math.cos(lat) * Math.cos(declination));

  if (!Number.isFinite(cosHA) || cosHA < -1 || cosHA > 1) {
    return null;
  }
  return Math.acos(cosHA) * R2D;
}

/**
 * Local solar hour (0-24, solar noon = 12) of the elevation crossing.
 */
export function timeForElevation(
  latitude: number,
  declination: number,
  elevationDegrees: number,
  isRising: boolean
): number | null {
  const hourAngle = hourAngleForElevation(latitude, declination, elevationDegrees);
  if (hourAngle === null) return null;

  const delta = hourAngle / 15;
  return isRising ? 12 - delta : 12 + delta;
}

/**
 * Instant at which the sun crosses `elevationDegrees` on `date` (YYYY-MM-DD)
 * at `coordinate`. The solar hour is shifted by the equation of time and the
 * longitude correction, then added to midnight UTC of the date.
 */
export function eventTime(
  date: string,
  coordinate: GeoCoordinate,
  elevationDegrees: number,
  isRising: boolean
): Date | null {
  const day = dayOfYear(date);
  const solarHour = timeForElevation(
    coordinate.latitude,
    solarDeclination(day),
    elevationDegrees,
    isRising
  );
  if (solarHour === null) return null;

  const clockHour =
    solarHour - equationOfTimeMinutes(day) / 60 - coordinate.longitude / 15;

  return new Date(utcMidnight(date) + clockHour * MS_PER_HOUR);
}

export function solarEventTime(
  date: string,
  coordinate: GeoCoordinate,
  event: SolarEvent
): Date | null {
  const { elevation, isRising } = EVENT_ELEVATIONS[event];
  return eventTime(date, coordinate, elevation, isRising);
}

export function solarEventTimes(
  date: string,
  coordinate: GeoCoordinate
): Record<SolarEvent, Date | null> {
  const at = (event: SolarEvent) => solarEventTime(date, coordinate, event);
  return {
    sunrise: at("sunrise"),
    sunset: at("sunset"),
    civilTwilightStart: at("civilTwilightStart"),
    civilTwilightEnd: at("civilTwilightEnd"),
    nauticalTwilightStart: at("nauticalTwilightStart"),
    nauticalTwilightEnd: at("nauticalTwilightEnd"),
    astronomicalTwilightStart: at("astronomicalTwilightStart"),
    astronomicalTwilightEnd: at("astronomicalTwilightEnd"),
  };
}

// ---------------------------------------------------------------------------
// Approximate profile (legacy visualization path)
// ---------------------------------------------------------------------------

export const APPROX_SUNRISE_MIN_HOUR = 5;
export const APPROX_SUNRISE_MAX_HOUR = 9;

/**
 * Legacy sunrise hour: 12 − acos(−tan φ · tan δ)/15, clamped to [5, 9].
 * The cosine is clamped to [−1, 1] first, so polar night lands on 9 and
 * polar day on 5 instead of NaN.
 */
export function sunriseHourApprox(latitude: number, declination: number): number {
  const cosHA = -Math.tan(latitude * D2R) * Math.tan(declination);
  const hourAngle = Math.acos(Math.max(-1, Math.min(1, cosHA)));
  const sunriseHour = 12 - (hourAngle * R2D) / 15;

  return Math.max(APPROX_SUNRISE_MIN_HOUR, Math.min(APPROX_SUNRISE_MAX_HOUR, sunriseHour));
}

export function approximateSunriseHour(date: string, latitude: number): number {
  return sunriseHourApprox(latitude, solarDeclination(dayOfYear(date)));
}

export function approximateSunsetHour(date: string, latitude: number): number {
  return 24 - approximateSunriseHour(date, latitude);
}
