import type { Timestamp } from "tp-shared/types";

export const WEEKDAYS = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

const toDate = (t: Timestamp) => new Date(t * 1000);

/** UTC calendar day, "YYYY-MM-DD" */
export const dayOf = (t: Timestamp) => toDate(t).toISOString().slice(0, 10);

/** UTC time of day, "HH:MM" */
export const timeOfDay = (t: Timestamp) => toDate(t).toISOString().slice(11, 16);

export function weekdayOf(t: Timestamp): Weekday {
  return WEEKDAYS[toDate(t).getUTCDay()] ?? "Sunday";
}
