/**
 * Session expiration policy
 * Sessions end at 03:00 local time: the same day when started before 03:00,
 * otherwise the next day.
 */

import { addDays, setHours, setMilliseconds, setMinutes, setSeconds } from "date-fns";
import { fromZonedTime, toZonedTime } from "date-fns-tz";

export const DEFAULT_SESSION_TIMEZONE = "Europe/Zurich";
export const SESSION_EXPIRY_HOUR = 3;

export function calculateSessionExpiration(
  start: Date,
  timezone: string = DEFAULT_SESSION_TIMEZONE,
): Date {
  const zonedStart = toZonedTime(start, timezone);
  const expiryDay =
    zonedStart.getHours() >= SESSION_EXPIRY_HOUR ? addDays(zonedStart, 1) : zonedStart;

  const zonedExpiry = setMilliseconds(
    setSeconds(setMinutes(setHours(expiryDay, SESSION_EXPIRY_HOUR), 0), 0),
    0,
  );
  return fromZonedTime(zonedExpiry, timezone);
}

export function isSessionExpired(
  start: Date,
  now: Date,
  timezone: string = DEFAULT_SESSION_TIMEZONE,
): boolean {
  return now.getTime() >= calculateSessionExpiration(start, timezone).getTime();
}

/**
 * True when the runtime knows the IANA zone name.
 */
export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}
