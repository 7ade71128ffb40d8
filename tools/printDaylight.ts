// DEV TOOL: prints the daylight periods, event times and gradient for one day.
import "dotenv/config";
import { parseCalendarDate } from "../astro/calendar/calendarDate.js";
import { formatSummary, summarizeDay } from "../astro/daylight/astronomicalSummary.js";
import { DaylightColorModel } from "../astro/daylight/daylightColorModel.js";
import { toCssRgba } from "../astro/daylight/daylightColors.js";
import { toGeoCoordinate } from "../astro/schemas/geoCoordinate.schema.js";
import { loadConfig } from "../lib/config.js";

function usage() {
  console.error("Usage: tsx tools/printDaylight.ts [YYYY-MM-DD] [latitude] [longitude] [timeZone]");
}

async function main() {
  const config = loadConfig();
  const date = process.argv[2] || new Date().toISOString().slice(0, 10);
  const latitude = process.argv[3] ? Number(process.argv[3]) : config.defaultCoordinate.latitude;
  const longitude = process.argv[4] ? Number(process.argv[4]) : config.defaultCoordinate.longitude;
  const timeZone = process.argv[5] || "UTC";

  try {
    parseCalendarDate(date);
  } catch (e) {
    usage();
    throw e;
  }

  const coordinate = toGeoCoordinate({ latitude, longitude });
  const model = new DaylightColorModel({ defaultCoordinate: coordinate });

  const payload = {
    date,
    coordinate,
    summary: formatSummary(summarizeDay(date, coordinate), timeZone),
    periods: model.periodsForDay(date).map((p) => ({
      phase: p.phase,
      startHour: Number(p.startHour.toFixed(2)),
      endHour: Number(p.endHour.toFixed(2)),
      color: toCssRgba(p.color),
    })),
    gradient: model.gradientForDay(date).map(toCssRgba),
  };

  console.log(JSON.stringify(payload, null, 2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
