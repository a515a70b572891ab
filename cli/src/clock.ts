/**
 * Timestamp and date formatting shared by the stores
 */

import { format, isMatch, parse } from "date-fns";
import type { DateString, Timestamp } from "@draftline/types";
import { ValidationError } from "./errors.js";

export const TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss";
export const DATE_FORMAT = "yyyy-MM-dd";

/**
 * Source of the current time. Stores take one so tests can pin it.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function toTimestamp(date: Date): Timestamp {
  return format(date, TIMESTAMP_FORMAT);
}

export function toDateString(date: Date): DateString {
  return format(date, DATE_FORMAT);
}

/**
 * Parse a stored timestamp. Date-only values are accepted as midnight.
 */
export function parseTimestamp(value: string): Date {
  const fmt = value.length > DATE_FORMAT.length ? TIMESTAMP_FORMAT : DATE_FORMAT;
  return parse(value, fmt, new Date(0));
}

export function parseDateString(value: DateString): Date {
  return parse(value, DATE_FORMAT, new Date(0));
}

/**
 * Validate user input as a `yyyy-MM-dd` date
 */
export function assertDateString(value: string, field = "date"): DateString {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value) || !isMatch(value, DATE_FORMAT)) {
    throw new ValidationError(`Invalid ${field}: '${value}' (expected yyyy-MM-dd)`, {
      [field]: value,
    });
  }
  return value;
}
