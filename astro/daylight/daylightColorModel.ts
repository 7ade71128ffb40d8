/**
 * Daylight phases and hour-of-day colors for the calendar gradient bars.
 *
 * The day is partitioned from the approximate (clamped) sunrise with fixed
 * twilight offsets. This is a visualization partition, not the precise
 * twilight times shown in the daily progression summary.
 */

import { approximateSunriseHour } from "../solar/solarCalculator.js";
import { NEW_YORK, type GeoCoordinate } from "../schemas/geoCoordinate.schema.js";
import { DAYLIGHT_PALETTE, interpolateColor, type DaylightColor } from "./daylightColors.js";

export type DaylightPhase =
  | "night"
  | "astronomicalTwilight"
  | "nauticalTwilight"
  | "civilTwilight"
  | "sunrise"
  | "goldenHour"
  | "daylight"
  | "sunset"
  | "goldenHourEvening"
  | "civilTwilightEvening"
  | "nauticalTwilightEvening"
  | "astronomicalTwilightEvening";

export type DaylightPeriod = {
  phase: DaylightPhase;
  startHour: number;
  endHour: number;
  color: DaylightColor;
};

/** Fraction of a period at each end that cross-fades into its neighbour. */
const BLEND_WINDOW = 0.2;

export function periodDuration(period: DaylightPeriod): number {
  return period.endHour - period.startHour;
}

/**
 * Thirteen contiguous periods covering [0, 24]. Night appears twice
 * (pre-dawn and post-dusk).
 */
export function periodsForDay(
  date: string,
  coordinate: GeoCoordinate = NEW_YORK
): DaylightPeriod[] {
  const sunrise = approximateSunriseHour(date, coordinate.latitude);
  const sunset = 24 - sunrise;
  const p = DAYLIGHT_PALETTE;

  return [
    { phase: "night", startHour: 0, endHour: sunrise - 2.5, color: p.night },
    { phase: "astronomicalTwilight", startHour: sunrise - 2.5, endHour: sunrise - 2.0, color: p.astronomicalTwilight },
    { phase: "nauticalTwilight", startHour: sunrise - 2.0, endHour: sunrise - 1.5, color: p.nauticalTwilight },
    { phase: "civilTwilight", startHour: sunrise - 1.5, endHour: sunrise - 0.5, color: p.civilTwilight },
    { phase: "sunrise", startHour: sunrise - 0.5, endHour: sunrise + 0.5, color: p.sunrise },
    { phase: "goldenHour", startHour: sunrise + 0.5, endHour: sunrise + 1.5, color: p.goldenHour },
    { phase: "daylight", startHour: sunrise + 1.5, endHour: sunset - 1.5, color: p.daylightRich },
    { phase: "goldenHourEvening", startHour: sunset - 1.5, endHour: sunset - 0.5, color: p.goldenHour },
    { phase: "sunset", startHour: sunset - 0.5, endHour: sunset + 0.5, color: p.sunrise },
    { phase: "civilTwilightEvening", startHour: sunset + 0.5, endHour: sunset + 1.5, color: p.civilTwilight },
    { phase: "nauticalTwilightEvening", startHour: sunset + 1.5, endHour: sunset + 2.0, color: p.nauticalTwilight },
    { phase: "astronomicalTwilightEvening", startHour: sunset + 2.0, endHour: sunset + 2.5, color: p.astronomicalTwilight },
    { phase: "night", startHour: sunset + 2.5, endHour: 24, color: p.night },
  ];
}

export function findPeriodIndex(periods: DaylightPeriod[], hour: number): number {
  return periods.findIndex((period) => hour >= period.startHour && hour < period.endHour);
}

/**
 * Daylight runs rich blue → light blue (midday) → rich blue.
 */
function daylightColorAt(progress: number): DaylightColor {
  const { daylightRich, daylightLight } = DAYLIGHT_PALETTE;
  if (progress < 0.5) {
    return interpolateColor(daylightRich, daylightLight, progress / 0.5);
  }
  return interpolateColor(daylightLight, daylightRich, (progress - 0.5) / 0.5);
}

/**
 * Color both sides of a boundary converge to. Daylight pins its own edge
 * color; any other pair meets halfway.
 */
function boundaryColor(a: DaylightPeriod, b: DaylightPeriod): DaylightColor {
  if (a.phase === "daylight") return daylightColorAt(1);
  if (b.phase === "daylight") return daylightColorAt(0);
  return interpolateColor(a.color, b.color, 0.5);
}

export function colorAt(periods: DaylightPeriod[], hour: number): DaylightColor {
  const index = findPeriodIndex(periods, hour);
  if (index === -1) return DAYLIGHT_PALETTE.night;

  const period = periods[index];
  const progress = (hour - period.startHour) / periodDuration(period);

  if (period.phase === "daylight") {
    return daylightColorAt(progress);
  }

  if (progress < BLEND_WINDOW && index > 0) {
    const edge = boundaryColor(periods[index - 1], period);
    return interpolateColor(edge, period.color, progress / BLEND_WINDOW);
  }

  if (progress > 1 - BLEND_WINDOW && index < periods.length - 1) {
    const edge = boundaryColor(period, periods[index + 1]);
    return interpolateColor(period.color, edge, (progress - (1 - BLEND_WINDOW)) / BLEND_WINDOW);
  }

  return period.color;
}

export type DaylightColorModelOptions = {
  defaultCoordinate?: GeoCoordinate;
};

/**
 * Hour → color lookups for a day. Stateless: every call recomputes the
 * periods, so it is safe to sample at high frequency.
 */
export class DaylightColorModel {
  private readonly defaultCoordinate: GeoCoordinate;

  constructor(options: DaylightColorModelOptions = {}) {
    this.defaultCoordinate = options.defaultCoordinate ?? NEW_YORK;
  }

  periodsForDay(date: string, coordinate: GeoCoordinate = this.defaultCoordinate): DaylightPeriod[] {
    return periodsForDay(date, coordinate);
  }

  colorForHour(
    hour: number,
    date: string,
    coordinate: GeoCoordinate = this.defaultCoordinate
  ): DaylightColor {
    return colorAt(periodsForDay(date, coordinate), hour);
  }

  /**
   * Colors for `slots` evenly spaced hours starting at midnight
   * (96 slots = one per 15 minutes).
   */
  gradientForDay(
    date: string,
    coordinate: GeoCoordinate = this.defaultCoordinate,
    slots = 96
  ): DaylightColor[] {
    const periods = periodsForDay(date, coordinate);
    const colors: DaylightColor[] = [];
    for (let i = 0; i < slots; i++) {
      colors.push(colorAt(periods, (i * 24) / slots));
    }
    return colors;
  }
}
