/**
 * Daily progression summary: precise solar event times, day/night lengths
 * and the moon phase at sunset. Absent events stay null here and render
 * as "N/A" in the formatted view.
 */

import { addDays } from "../calendar/calendarDate.js";
import { computeLunarPhase, type LunarPhase } from "../lunar/lunarPhase.js";
import type { GeoCoordinate } from "../schemas/geoCoordinate.schema.js";
import {
  solarEventTime,
  solarEventTimes,
  type SolarEvent,
} from "../solar/solarCalculator.js";

const MS_PER_HOUR = 60 * 60 * 1000;
const NOT_AVAILABLE = "N/A";

export interface AstronomicalSummary {
  date: string;
  coordinate: GeoCoordinate;
  events: Record<SolarEvent, Date | null>;
  daylightHours: number | null;
  nightHours: number | null;
  moon: LunarPhase;
}

export type FormattedAstronomicalSummary = Record<SolarEvent, string> & {
  daylightDuration: string;
  nightDuration: string;
  moonPhase: string;
};

export function durationInHours(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / MS_PER_HOUR;
}

/**
 * "10h 5m"; minutes are rounded and carried into hours.
 */
export function formatDuration(hours: number): string {
  const totalMinutes = Math.round(hours * 60);
  const h = Math.floor(totalMinutes / 60);
  const m = totalMinutes % 60;
  return `${h}h ${m}m`;
}

export function formatEventTime(instant: Date | null, timeZone = "UTC"): string {
  if (!instant) return NOT_AVAILABLE;
  return new Intl.DateTimeFormat("en-US", {
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
    timeZone,
  }).format(instant);
}

export function summarizeDay(date: string, coordinate: GeoCoordinate): AstronomicalSummary {
  const events = solarEventTimes(date, coordinate);
  const { sunrise, sunset } = events;

  let daylightHours: number | null = null;
  let nightHours: number | null = null;
  if (sunrise && sunset) {
    daylightHours = durationInHours(sunrise, sunset);
    const nextSunrise = solarEventTime(addDays(date, 1), coordinate, "sunrise") ?? sunset;
    nightHours = durationInHours(sunset, nextSunrise);
  }

  // Without a sunset, sample the moon at solar noon of the date instead
  const moonInstant =
    sunset ?? new Date(Date.parse(`${date}T12:00:00Z`) - (coordinate.longitude / 15) * MS_PER_HOUR);

  return {
    date,
    coordinate,
    events,
    daylightHours,
    nightHours,
    moon: computeLunarPhase(moonInstant),
  };
}

export function formatSummary(
  summary: AstronomicalSummary,
  timeZone = "UTC"
): FormattedAstronomicalSummary {
  const time = (event: SolarEvent) => formatEventTime(summary.events[event], timeZone);

  return {
    sunrise: time("sunrise"),
    sunset: time("sunset"),
    civilTwilightStart: time("civilTwilightStart"),
    civilTwilightEnd: time("civilTwilightEnd"),
    nauticalTwilightStart: time("nauticalTwilightStart"),
    nauticalTwilightEnd: time("nauticalTwilightEnd"),
    astronomicalTwilightStart: time("astronomicalTwilightStart"),
    astronomicalTwilightEnd: time("astronomicalTwilightEnd"),
    daylightDuration:
      summary.daylightHours === null ? NOT_AVAILABLE : formatDuration(summary.daylightHours),
    nightDuration:
      summary.nightHours === null ? NOT_AVAILABLE : formatDuration(summary.nightHours),
    moonPhase: summary.moon.phase_name.replace(/_/g, " "),
  };
}
