/**
 * Explicit errors for malformed astronomical inputs.
 * Unreachable solar elevations are not errors: they resolve to null.
 */

export class InvalidCalendarDateError extends Error {
  constructor(public date: string) {
    super(`Invalid calendar date "${date}"; expected YYYY-MM-DD`);
    this.name = "InvalidCalendarDateError";
  }
}

export class InvalidCoordinateError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid coordinate: ${issues.join("; ")}`);
    this.name = "InvalidCoordinateError";
  }
}
