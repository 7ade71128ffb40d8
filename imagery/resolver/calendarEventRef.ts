/**
 * The slice of a calendar event the image resolver reads and updates.
 */
export type CalendarEventRef = {
  id?: string;
  title: string;
  location?: string;
  assignedImageId?: string;
};

export function withAssignedImage(event: CalendarEventRef, imageId: string): CalendarEventRef {
  return { ...event, assignedImageId: imageId };
}
