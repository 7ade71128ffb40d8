/**
 * RGBA color used by the daylight visualization.
 * r, g, b are 0-255; a is 0-1.
 */
export type DaylightColor = {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
};

function rgb(r: number, g: number, b: number): DaylightColor {
  return Object.freeze({ r, g, b, a: 1 });
}

export const DAYLIGHT_PALETTE = {
  night: rgb(0, 0, 0),
  astronomicalTwilight: rgb(10, 0, 20), // very dark purple
  nauticalTwilight: rgb(20, 0, 40),
  civilTwilight: rgb(40, 20, 80), // purple-blue
  sunrise: rgb(255, 100, 50), // red-orange, also used for sunset
  goldenHour: rgb(255, 200, 100),
  daylightRich: rgb(25, 25, 112),
  daylightLight: rgb(100, 180, 255),
} as const;

/**
 * Per-channel linear interpolation; factor is clamped to [0, 1].
 */
export function interpolateColor(
  start: DaylightColor,
  end: DaylightColor,
  factor: number
): DaylightColor {
  const t = Math.max(0, Math.min(1, factor));
  return {
    r: start.r + (end.r - start.r) * t,
    g: start.g + (end.g - start.g) * t,
    b: start.b + (end.b - start.b) * t,
    a: start.a + (end.a - start.a) * t,
  };
}

export function toCssRgba(color: DaylightColor): string {
  const channel = (v: number) => Math.round(v);
  return `rgba(${channel(color.r)}, ${channel(color.g)}, ${channel(color.b)}, ${color.a})`;
}
