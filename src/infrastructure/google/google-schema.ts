import { z } from 'zod';

/** Response of the OAuth token endpoint (code exchange and refresh). */
export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().int().positive(),
  refresh_token: z.string().min(1).optional(),
});

const eventTimeSchema = z.object({
  dateTime: z.string().optional(),
  date: z.string().optional(),
});

/** A single item of `calendars/{id}/events`. */
export const calendarEventSchema = z.object({
  id: z.string(),
  status: z.string().optional(),
  summary: z.string().optional(),
  htmlLink: z.string().optional(),
  start: eventTimeSchema.optional(),
  attendees: z.array(z.object({
    self: z.boolean().optional(),
    responseStatus: z.string().optional(),
  })).optional(),
});

export type CalendarEvent = z.infer<typeof calendarEventSchema>;

export const eventsPageSchema = z.object({
  items: z.array(z.unknown()).default([]),
  nextPageToken: z.string().optional(),
});

export const calendarListSchema = z.object({
  items: z.array(z.object({
    id: z.string(),
    summary: z.string().optional(),
    primary: z.boolean().optional(),
  })).default([]),
  nextPageToken: z.string().optional(),
});
