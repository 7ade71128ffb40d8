import { z } from "zod";
import { InvalidCoordinateError } from "../errors.js";

export const GeoCoordinateSchema = z
  .object({
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
  })
  .readonly();

export type GeoCoordinate = z.infer<typeof GeoCoordinateSchema>;

export const NEW_YORK: GeoCoordinate = Object.freeze({
  latitude: 40.7128,
  longitude: -74.006,
});

/**
 * Validate and freeze a coordinate. Throws InvalidCoordinateError listing
 * every out-of-range field.
 */
export function toGeoCoordinate(input: {
  latitude: number;
  longitude: number;
}): GeoCoordinate {
  const parsed = GeoCoordinateSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidCoordinateError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return Object.freeze({ ...parsed.data });
}
