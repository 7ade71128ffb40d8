import type { CalendarEventRef } from "../resolver/calendarEventRef.js";

const MAX_TITLE_KEYWORDS = 3;
const MAX_LOCATION_PARTS = 2;

// First matching rule wins
const THEME_KEYWORDS: ReadonlyArray<{ triggers: string[]; keyword: string }> = [
  { triggers: ["meeting", "conference"], keyword: "business" },
  { triggers: ["birthday", "party"], keyword: "celebration" },
  { triggers: ["vacation", "travel"], keyword: "travel" },
  { triggers: ["workout", "exercise"], keyword: "fitness" },
];

/**
 * Provider search query for an event: a few title keywords, the leading
 * location parts and one theme keyword, lowercased.
 */
export function buildSearchQuery(event: Pick<CalendarEventRef, "title" | "location">): string {
  const parts = event.title
    .split(/\s+/)
    .filter((w) => w.length > 2)
    .slice(0, MAX_TITLE_KEYWORDS);

  if (event.location) {
    parts.push(
      ...event.location
        .split(/[, ]/)
        .filter((p) => p.length > 0)
        .slice(0, MAX_LOCATION_PARTS)
    );
  }

  const title = event.title.toLowerCase();
  const theme = THEME_KEYWORDS.find((rule) => rule.triggers.some((t) => title.includes(t)));
  if (theme) parts.push(theme.keyword);

  return parts.join(" ").toLowerCase();
}
